import type Database from 'better-sqlite3';
import {
  BlockersProjector,
  DependencyService,
  EventStore,
  LedgerTaskStore,
  ProjectionEngine,
  TaskService,
  TasksCurrentProjector,
  ValidationService,
  createConnection,
  silentLogger,
  type Logger,
} from 'blockwise-core';
import { readConfig, resolveDbPath } from './config.js';
import { createCliLogger } from './logger.js';
import type { GlobalOptions } from './types.js';

export interface Services {
  db: Database.Database;
  logger: Logger;
  eventStore: EventStore;
  projectionEngine: ProjectionEngine;
  taskStore: LedgerTaskStore;
  dependencyService: DependencyService;
  taskService: TaskService;
  validationService: ValidationService;
}

export interface InitializeDbOptions {
  dbPath: string;
  logger?: Logger;
  /** Recorded on every event this session appends. */
  author?: string;
  agentId?: string;
}

export function initializeDb(options: InitializeDbOptions): Services {
  const logger = options.logger ?? silentLogger();
  const db = createConnection(options.dbPath);

  const eventStore = new EventStore(db);
  const projectionEngine = new ProjectionEngine(db);
  projectionEngine.register(new TasksCurrentProjector());
  projectionEngine.register(new BlockersProjector());

  const taskStore = new LedgerTaskStore(db, eventStore, projectionEngine, {
    author: options.author,
    agent_id: options.agentId,
  });
  const dependencyService = new DependencyService(taskStore, {
    logger: logger.child({ component: 'dependencies' }),
  });
  const taskService = new TaskService(taskStore, dependencyService, {
    logger: logger.child({ component: 'tasks' }),
  });
  const validationService = new ValidationService(taskStore);

  logger.debug({ dbPath: options.dbPath }, 'database opened');

  return {
    db,
    logger,
    eventStore,
    projectionEngine,
    taskStore,
    dependencyService,
    taskService,
    validationService,
  };
}

/** Open the database a command's global options point at. */
export function initializeDbFromOptions(globalOpts: GlobalOptions): Services {
  const config = readConfig();
  return initializeDb({
    dbPath: resolveDbPath(globalOpts.db, config),
    logger: createCliLogger(config),
    author: globalOpts.author,
    agentId: globalOpts.agent,
  });
}

export function initializeDbFromPath(dbPath: string): Services {
  return initializeDb({ dbPath });
}

export function closeDb(services: Services): void {
  services.db.close();
}
