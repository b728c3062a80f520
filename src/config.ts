// compiled-in settings; the store takes no flags, files or environment variables
export interface AppConfig {
  logLevel: string;
  currencySymbol: string;
  maxQuantity: number;
}

const DEFAULT_CONFIG: AppConfig = {
  logLevel: 'warn',
  currencySymbol: '$',
  maxQuantity: 99,
};

export function loadConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return { ...DEFAULT_CONFIG, ...overrides };
}
