import { Controller, Get } from '@nestjs/common';

@Controller()
export class AppController {
  @Get()
  getInfo() {
    return {
      name: 'Attachment Keyword Monitor',
      version: '1.0.0',
      description: 'Surveillance des pièces jointes Gmail par mot-clé',
      features: [
        'Lecture périodique de la boîte IMAP',
        'Extraction du texte: texte brut, CSV, PDF, Word, Excel, noms des entrées ZIP',
        'Comparaison insensible à la casse après normalisation Unicode',
        'Déduplication persistante des emails déjà évalués',
        'Notification webhook signée pour chaque nouvelle correspondance',
      ],
      endpoints: {
        monitor: {
          'GET /monitor/status': 'État de la surveillance',
          'POST /monitor/start': 'Démarrer (keyword, lookbackDays, intervalSeconds)',
          'POST /monitor/stop': 'Arrêter',
          'POST /monitor/run-once': 'Exécuter une vérification manuelle',
          'GET /monitor/matches': 'Correspondances enregistrées (search, limit)',
          'GET /monitor/matches/:id': "Détail d'une correspondance",
        },
        webhooks: {
          'GET /webhooks/endpoints': 'Liste des endpoints',
          'POST /webhooks/endpoints': 'Ajouter un endpoint',
          'DELETE /webhooks/endpoints/:id': 'Supprimer un endpoint',
          'GET /webhooks/history': 'Historique des envois',
          'POST /webhooks/test': 'Envoyer un événement de test',
        },
      },
    };
  }

  @Get('health')
  healthCheck() {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
    };
  }
}
