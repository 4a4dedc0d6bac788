const toBool = (value: string | undefined, fallback: boolean): boolean =>
  value === undefined ? fallback : ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());

export default () => ({
  app: {
    port: parseInt(process.env.PORT || '3000', 10),
    dbPath: process.env.DB_PATH || './data/attachment-monitor.db',
    outputDir: process.env.OUTPUT_DIR || './output',
  },
  imap: {
    host: process.env.IMAP_HOST || 'imap.gmail.com',
    port: parseInt(process.env.IMAP_PORT || '993', 10),
    user: process.env.IMAP_USER,
    password: process.env.IMAP_PASSWORD,
    tls: toBool(process.env.IMAP_TLS, true),
    authTimeout: parseInt(process.env.IMAP_AUTH_TIMEOUT || '10000', 10),
    folder: process.env.IMAP_FOLDER || 'INBOX',
    tlsOptions: {
      rejectUnauthorized: toBool(process.env.IMAP_TLS_REJECT_UNAUTHORIZED, true),
    },
  },
  monitor: {
    keyword: process.env.MONITOR_KEYWORD || '',
    lookbackDays: parseInt(process.env.MONITOR_LOOKBACK_DAYS || '1', 10),
    intervalSeconds: parseInt(process.env.MONITOR_INTERVAL_SECONDS || '300', 10),
    fetchTimeoutMs: parseInt(process.env.MONITOR_FETCH_TIMEOUT_MS || '60000', 10),
    concurrency: parseInt(process.env.MONITOR_CONCURRENCY || '4', 10),
    autoStart: toBool(process.env.MONITOR_AUTO_START, false),
    bodyPreviewLength: parseInt(process.env.MONITOR_BODY_PREVIEW_LENGTH || '500', 10),
  },
  webhook: {
    defaultUrl: process.env.WEBHOOK_URL || '',
    secret: process.env.WEBHOOK_SECRET || '',
    timeoutMs: parseInt(process.env.WEBHOOK_TIMEOUT_MS || '10000', 10),
    retryDelayMs: parseInt(process.env.WEBHOOK_RETRY_DELAY_MS || '1000', 10),
  },
});
