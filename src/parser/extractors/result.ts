import { ExtractionResult } from '../../common/interfaces';

export const UNSUPPORTED: ExtractionResult = { kind: 'unsupported' };

export const textResult = (text: string): ExtractionResult => ({ kind: 'text', text });

export const decodeFailure = (reason: string): ExtractionResult => ({ kind: 'decode_error', reason });
