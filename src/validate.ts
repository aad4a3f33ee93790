export const REQUIRED_ENV_VARS = ['BOT_TOKEN', 'DATA_PATH', 'CLIENT_NAMES'] as const;

export type SettingKind = 'string' | 'boolean' | 'number';

/** Static schema of the bot settings file. Keys not listed here are ignored. */
export const SETTINGS_SCHEMA = {
  prefix: 'string',
  auto_repair_mismatched_clients: 'boolean',
  activity_type: 'string',
  admin_reply_ttl_seconds: 'number',
} as const satisfies Record<string, SettingKind>;

type KindToType = {
  string: string;
  boolean: boolean;
  number: number;
};

export type BotSettings = {
  -readonly [K in keyof typeof SETTINGS_SCHEMA]: KindToType[(typeof SETTINGS_SCHEMA)[K]];
};

export type SettingsProblem = {
  key: string;
  expected: SettingKind;
  /** `typeof` of the value found, or 'missing'. */
  actual: string;
};

/** Names of required environment variables that are unset or blank. */
export function missingEnvironment(env: NodeJS.ProcessEnv): string[] {
  return REQUIRED_ENV_VARS.filter((name) => (env[name] ?? '').trim() === '');
}

export function checkEnvironment(env: NodeJS.ProcessEnv = process.env): boolean {
  return missingEnvironment(env).length === 0;
}

function matchesKind(value: unknown, kind: SettingKind): boolean {
  if (kind === 'number') return typeof value === 'number' && Number.isFinite(value);
  return typeof value === kind;
}

export function configurationProblems(cfg: Record<string, unknown>): SettingsProblem[] {
  const problems: SettingsProblem[] = [];
  for (const [key, expected] of Object.entries(SETTINGS_SCHEMA)) {
    const value = cfg[key];
    if (!matchesKind(value, expected)) {
      problems.push({ key, expected, actual: value === undefined ? 'missing' : typeof value });
    }
  }
  return problems;
}

export function checkConfiguration(cfg: Record<string, unknown>): cfg is Record<string, unknown> & BotSettings {
  return configurationProblems(cfg).length === 0;
}
