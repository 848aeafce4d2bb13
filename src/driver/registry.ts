import { defaultLogger, type Logger } from '../utils/logger.js';
import { createSQLiteFactory } from './sqlite.js';
import type { DatabaseFactory } from './types.js';

/**
 * Holds the process-wide default factory used when createDatabaseManager() is given none.
 * Set once at startup through initStorage().
 */
export class FactoryRegistry {
  private factory: DatabaseFactory | null = null;

  get current(): DatabaseFactory | null {
    return this.factory;
  }

  register(factory: DatabaseFactory): DatabaseFactory | null {
    const previous = this.factory;
    this.factory = factory;
    return previous;
  }

  reset(): void {
    this.factory = null;
  }
}

export const factoryRegistry = new FactoryRegistry();

export interface InitStorageOptions {
  /** Defaults to the better-sqlite3 factory. */
  factory?: DatabaseFactory;
  logger?: Logger;
}

export function initStorage(options: InitStorageOptions = {}): DatabaseFactory {
  const factory = options.factory ?? createSQLiteFactory();
  const previous = factoryRegistry.register(factory);
  if (previous && previous !== factory) {
    (options.logger ?? defaultLogger).warn(
      `Replacing default database factory "${previous.name}" with "${factory.name}"`
    );
  }
  return factory;
}

export function shutdownStorage(): void {
  factoryRegistry.reset();
}
