import { InvalidConfigurationError } from "./errors";

export interface SimulationConfig {
  /** Size of the paged region, in KB. */
  totalMemory: number;
  /** Size of one page frame, in KB. Must divide `totalMemory`. */
  pageSize: number;
  /** Last tick the loop may simulate before giving up. */
  maxTicks: number;
}

export const DEFAULT_CONFIG: Readonly<SimulationConfig> = {
  totalMemory: 2000,
  pageSize: 200,
  maxTicks: 100000,
};

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

export function validateMemoryLayout(totalMemory: number, pageSize: number) {
  if (!isPositiveInteger(totalMemory)) {
    throw new InvalidConfigurationError(
      `total memory must be a positive integer (got ${totalMemory})`
    );
  }
  if (!isPositiveInteger(pageSize)) {
    throw new InvalidConfigurationError(
      `page size must be a positive integer (got ${pageSize})`
    );
  }
  if (totalMemory % pageSize !== 0) {
    throw new InvalidConfigurationError(
      `total memory ${totalMemory} is not a multiple of page size ${pageSize}`
    );
  }
}

export function resolveConfig(
  overrides: Partial<SimulationConfig> = {}
): SimulationConfig {
  const config: SimulationConfig = {
    ...DEFAULT_CONFIG,
    ...overrides,
  };

  validateMemoryLayout(config.totalMemory, config.pageSize);

  if (!Number.isInteger(config.maxTicks) || config.maxTicks < 0) {
    throw new InvalidConfigurationError(
      `tick budget must be a non-negative integer (got ${config.maxTicks})`
    );
  }

  return config;
}
