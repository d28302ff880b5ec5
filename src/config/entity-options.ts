/**
 * Runtime options for entity hydration and navigation loading
 */
export interface EntityOptions {
  /**
   * Log every construction from raw data (default: false)
   */
  logHydration: boolean;

  /**
   * Log every navigation fetch issued through a RelatedDataFetcher (default: false)
   */
  logNavigationLoads: boolean;

  /**
   * Receives log lines (default: console.log)
   */
  logger: (message: string) => void;
}

const defaultOptions: EntityOptions = {
  logHydration: false,
  logNavigationLoads: false,
  logger: (message) => console.log(message),
};

let currentOptions: EntityOptions = { ...defaultOptions };

/**
 * Override some options, keeping the rest
 */
export function configureEntities(options: Partial<EntityOptions>): void {
  currentOptions = { ...currentOptions, ...options };
}

/**
 * Get the active options
 */
export function getEntityOptions(): Readonly<EntityOptions> {
  return currentOptions;
}

/**
 * Restore the default options
 */
export function resetEntityOptions(): void {
  currentOptions = { ...defaultOptions };
}

/**
 * Read logging switches from environment variables:
 * `ODATA_LOG_HYDRATION` and `ODATA_LOG_NAVIGATION` (`true` or `1`).
 * Variables that are not set are left out of the result.
 */
export function entityOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<EntityOptions> {
  const options: Partial<EntityOptions> = {};

  const logHydration = parseFlag(env.ODATA_LOG_HYDRATION);
  if (logHydration !== undefined) options.logHydration = logHydration;

  const logNavigationLoads = parseFlag(env.ODATA_LOG_NAVIGATION);
  if (logNavigationLoads !== undefined) options.logNavigationLoads = logNavigationLoads;

  return options;
}

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const normalized = value.trim().toLowerCase();
  return normalized === 'true' || normalized === '1';
}
