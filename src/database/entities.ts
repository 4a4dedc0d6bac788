// Résultat d'un appel à recordEvaluated
export type RecordOutcome = 'recorded' | 'unchanged';

export interface MatchQuery {
  search?: string;
  limit?: number;
}

export interface DedupStats {
  evaluated: number;
  matched: number;
}
