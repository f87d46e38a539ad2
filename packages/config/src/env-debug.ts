const SECRET_PATTERN = /(TOKEN|SECRET|PASSWORD|KEY)/i;
const URL_WITH_CREDENTIALS = /^([a-z]+:\/\/)([^@/]+)@/i;

const WATCHED_PREFIXES = [
  'NODE_ENV',
  'PORT',
  'LOG_LEVEL',
  'STORE_',
  'DATABASE_',
  'TELEGRAM_',
  'SCHOOL_',
  'DEFAULT_LOCALE',
  'STAFF_',
  'ADMIN_',
  'TOUR_',
  'REMINDER_',
  'FOLLOWUP_',
  'STATUS_CHECK_',
  'KOMMO_',
  'CRM_',
  'SYNC_',
];

let printed = false;

export function isWatchedEnv(name: string): boolean {
  return WATCHED_PREFIXES.some((prefix) => name.startsWith(prefix));
}

export function redactEnvValue(name: string, value: string): string {
  if (SECRET_PATTERN.test(name)) {
    return value.length <= 4 ? '****' : `${value.slice(0, 2)}****${value.slice(-2)}`;
  }
  return value.replace(URL_WITH_CREDENTIALS, '$1****@');
}

/**
 * Prints a one-time summary of the critical environment variables.
 *
 * Only active when `ENV_DEBUG` is `true`, `1` or `yes`. Secrets are masked.
 */
export function envDebug(serviceName: string): void {
  if (printed) return;
  const flag = (process.env.ENV_DEBUG ?? '').toLowerCase();
  if (!['true', '1', 'yes'].includes(flag)) return;
  printed = true;

  const lines = Object.keys(process.env)
    .filter(isWatchedEnv)
    .sort()
    .map((name) => `  ${name}=${redactEnvValue(name, process.env[name] ?? '')}`);

  console.log(`[env-debug] ${serviceName}\n${lines.join('\n')}`);
}
