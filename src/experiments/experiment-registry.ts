/**
 * ExperimentRegistry
 *
 * Keeps one Splitter per named experiment. The core cannot tell whether a
 * salt is unique, so this layer checks what it can see: two registered
 * experiments sharing a salt produce correlated assignments and are logged.
 */

import * as fs from 'node:fs/promises';
import { getWeightSpec, parseExperimentConfig, parseExperimentsFile } from '../config.js';
import type { ExperimentConfig } from '../config.js';
import { experimentNotFound, invalidArgument, ioError } from '../errors.js';
import { createLogger, setGlobalLogLevel } from '../logger.js';
import { Splitter } from '../splitter.js';
import type { Identifier } from '../types.js';

const logger = createLogger('ExperimentRegistry');

function errnoOf(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export class ExperimentRegistry {
  private readonly splitters = new Map<string, Splitter>();
  /** salt -> first experiment registered with it */
  private readonly saltOwners = new Map<string, string>();

  /**
   * Load experiments from a JSON file shaped `{ "experiments": [...] }`.
   *
   * @throws SplitterError IO_ERROR if the file can't be read,
   *   INVALID_ARGUMENT if it isn't valid JSON or fails validation
   */
  static async fromFile(filePath: string): Promise<ExperimentRegistry> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      throw ioError(filePath, 'read', errnoOf(error));
    }

    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw invalidArgument('experiments', filePath, `not valid JSON: ${reason}`);
    }

    const parsed = parseExperimentsFile(document);
    if (parsed.logLevel !== undefined) {
      setGlobalLogLevel(parsed.logLevel);
    }

    const registry = new ExperimentRegistry();
    for (const experiment of parsed.experiments) {
      registry.register(experiment);
    }
    logger.info('Loaded experiments', { path: filePath, count: registry.splitters.size });
    return registry;
  }

  /**
   * Register an experiment and build its splitter.
   *
   * @throws SplitterError INVALID_ARGUMENT on a bad config or duplicate name,
   *   INVALID_WEIGHTS when its weights don't validate
   */
  register(input: ExperimentConfig): Splitter {
    const config = parseExperimentConfig(input);

    if (this.splitters.has(config.name)) {
      throw invalidArgument('name', config.name, 'experiment is already registered');
    }

    const splitter = new Splitter(config.salt, getWeightSpec(config));

    const owner = this.saltOwners.get(config.salt);
    if (owner !== undefined) {
      logger.warn('Salt reused across experiments; their assignments will be correlated', {
        salt: config.salt,
        experiments: [owner, config.name],
      });
    } else {
      this.saltOwners.set(config.salt, config.name);
    }

    this.splitters.set(config.name, splitter);
    logger.debug('Registered experiment', { name: config.name, groups: splitter.labels });
    return splitter;
  }

  /**
   * @throws SplitterError NOT_FOUND
   */
  get(name: string): Splitter {
    const splitter = this.splitters.get(name);
    if (!splitter) {
      throw experimentNotFound(name);
    }
    return splitter;
  }

  has(name: string): boolean {
    return this.splitters.has(name);
  }

  assign(name: string, identifier: Identifier): string {
    return this.get(name).assign(identifier);
  }

  /** Registered experiment names, in registration order */
  names(): string[] {
    return [...this.splitters.keys()];
  }
}
