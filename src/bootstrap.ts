/**
 * Bootstrap and dependency wiring
 * ARCHITECTURE: Returns Result instead of throwing - follows Result pattern
 */

import { Configuration, ConfigurationSchema, loadConfiguration } from './core/configuration.js';
import { Logger } from './core/interfaces.js';
import { PathwiseError, toPathwiseError } from './core/errors.js';
import { Result, tryCatch } from './core/result.js';
import { createLogger } from './implementations/logger.js';
import { PathService } from './services/path-service.js';

export interface Services {
  readonly config: Configuration;
  readonly logger: Logger;
  readonly pathService: PathService;
}

export interface BootstrapOptions {
  /** Values that win over env and config file (CLI flags, tests) */
  readonly overrides?: Partial<Configuration>;
  /** Replaces the logger built from configuration */
  readonly logger?: Logger;
}

export function bootstrap(options: BootstrapOptions = {}): Result<Services, PathwiseError> {
  return tryCatch(() => {
    const config = ConfigurationSchema.parse({ ...loadConfiguration(), ...options.overrides });
    const logger = options.logger ?? createLogger(config);

    logger.debug('Bootstrapping pathwise', { config });

    const pathService = new PathService(
      { traversal: config.traversal, stopOnCycle: config.stopOnCycle },
      logger.child({ module: 'path-service' })
    );

    return { config, logger, pathService };
  }, toPathwiseError);
}
