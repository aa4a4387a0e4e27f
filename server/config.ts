export type AppConfig = {
  databasePath: string;
  port: number;
  plugins: string[];
  defaultLanguage: string;
};

function parseIntegerEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`Invalid env var: ${name} must be a non-negative integer`);
  }
  return value;
}

function parseListEnv(name: string, fallback: string): string[] {
  return (process.env[name] ?? fallback)
    .split(',')
    .map((value) => value.trim().toLowerCase())
    .filter(Boolean);
}

export function loadConfig(): AppConfig {
  return {
    databasePath: process.env.DATABASE_PATH ?? './data/inbox.sqlite',
    port: parseIntegerEnv('PORT', 3000),
    plugins: parseListEnv('INBOX_PLUGINS', 'salons'),
    defaultLanguage: (process.env.DEFAULT_LANGUAGE ?? 'en').trim() || 'en',
  };
}
