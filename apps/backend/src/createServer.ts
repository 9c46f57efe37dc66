import express from 'express';
import cors from 'cors';
import helmet from 'helmet';

import type { AppConfig } from './config/index.js';
import { initializeDrizzleDatabase, type DrizzleDatabase } from './db/index.js';
import { errorHandler, requestLogger } from './middleware/errorHandler.js';
import { createAuthMiddleware } from './middleware/auth.js';
import { DeletionAuditRepository } from './repositories/deletionAuditRepository.js';
import { DuplicateGroupRepository } from './repositories/duplicateGroupRepository.js';
import { LibraryPreferencesRepository } from './repositories/libraryPreferencesRepository.js';
import { ScanJobRepository } from './repositories/scanJobRepository.js';
import { ScanScheduleRepository } from './repositories/scanScheduleRepository.js';
import { createAuditRouter } from './routes/audit.js';
import { createHealthRouter } from './routes/health.js';
import { createLibrariesRouter } from './routes/libraries.js';
import { createScansRouter } from './routes/scans.js';
import { createJellyfinCatalog } from './services/catalog/jellyfinCatalog.js';
import type { MediaCatalog } from './services/catalog/mediaCatalog.js';
import type { FileSizeLookup } from './services/detection/duplicateGrouper.js';
import { DuplicateScanService } from './services/duplicateScanService.js';
import logger, { type AppLogger } from './services/logger.js';
import { ScanLock, scanLock as processScanLock } from './services/scanLock.js';
import { SchedulerService, type CronApi } from './services/schedulerService.js';
import { statFileSize } from './utils/fileSize.js';

const DEFAULT_AUDIT_RETENTION_CRON = '0 3 * * *';

export interface ServerDependencies {
  drizzleDatabase?: DrizzleDatabase;
  catalog?: MediaCatalog | null;
  scanLock?: ScanLock;
  getFileSize?: FileSizeLookup;
  cronApi?: CronApi;
  log?: AppLogger;
}

export interface AppRepositories {
  groups: DuplicateGroupRepository;
  preferences: LibraryPreferencesRepository;
  audit: DeletionAuditRepository;
  jobs: ScanJobRepository;
  schedules: ScanScheduleRepository;
}

export interface AppContext {
  config: AppConfig;
  catalog: MediaCatalog | null;
  repositories: AppRepositories;
  scanService: DuplicateScanService | null;
  scheduler: SchedulerService;
  close: () => void;
}

const buildCatalog = (appConfig: AppConfig, deps: ServerDependencies): MediaCatalog | null => {
  if ('catalog' in deps) {
    return deps.catalog ?? null;
  }

  if (!appConfig.jellyfin) {
    logger.warn('JELLYFIN_URL is not set; scanning is unavailable');
    return null;
  }

  return createJellyfinCatalog({ baseUrl: appConfig.jellyfin.url, apiKey: appConfig.jellyfin.apiKey });
};

/**
 * Wires repositories and services. Injected dependencies replace the
 * defaults built from configuration.
 */
export const createAppContext = (appConfig: AppConfig, deps: ServerDependencies = {}): AppContext => {
  const log = deps.log ?? logger;

  let closeDatabase = () => {};
  let db: DrizzleDatabase;
  if (deps.drizzleDatabase) {
    db = deps.drizzleDatabase;
  } else {
    const handle = initializeDrizzleDatabase({ filePath: appConfig.database.sqlitePath });
    db = handle.db;
    closeDatabase = handle.close;
  }

  const repositories: AppRepositories = {
    groups: new DuplicateGroupRepository(db),
    preferences: new LibraryPreferencesRepository(db),
    audit: new DeletionAuditRepository(db),
    jobs: new ScanJobRepository(db),
    schedules: new ScanScheduleRepository(db),
  };

  const catalog = buildCatalog(appConfig, deps);

  const scanService = catalog
    ? new DuplicateScanService({
        catalog,
        groups: repositories.groups,
        preferences: repositories.preferences,
        jobs: repositories.jobs,
        options: {
          enabled: appConfig.scanner.enabled,
          workers: appConfig.scanner.workers,
          groupingMode: appConfig.scanner.groupingMode,
        },
        lock: deps.scanLock ?? processScanLock,
        getFileSize: deps.getFileSize ?? statFileSize,
        log,
      })
    : null;

  const scheduler = new SchedulerService(
    { auditRetentionDays: appConfig.audit.retentionDays },
    {
      schedules: repositories.schedules,
      scanService: scanService?.isEnabled() ? scanService : null,
      audit: repositories.audit,
      cronApi: deps.cronApi,
      log,
    },
  );

  return {
    config: appConfig,
    catalog,
    repositories,
    scanService,
    scheduler,
    close: () => {
      scheduler.stop();
      closeDatabase();
    },
  };
};

/**
 * Startup housekeeping: fails jobs a previous process left running and
 * seeds the cron rows configured through the environment.
 */
export const prepareSchedules = ({ config: appConfig, repositories }: AppContext): void => {
  const interrupted = repositories.jobs.failInterrupted();
  if (interrupted > 0) {
    logger.warn('Marked interrupted scan jobs as failed', { count: interrupted });
  }

  if (appConfig.scanner.cronExpression) {
    repositories.schedules.upsert('duplicate_scan', appConfig.scanner.cronExpression);
  }

  const retention = repositories.schedules.getByJobType('audit_retention');
  const retentionEnabled = appConfig.audit.retentionDays > 0;
  if (retention || retentionEnabled) {
    repositories.schedules.upsert(
      'audit_retention',
      retention?.cronExpression ?? DEFAULT_AUDIT_RETENTION_CRON,
      retentionEnabled,
    );
  }
};

export const createApp = (context: AppContext) => {
  const app = express();
  const { config: appConfig, repositories } = context;

  const authMiddleware = createAuthMiddleware({ token: appConfig.auth?.token ?? null });

  app.use(helmet());
  app.use(
    cors({
      methods: ['GET', 'POST', 'PUT', 'PATCH', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-API-Key'],
      maxAge: 86400,
    }),
  );
  app.use(express.json({ limit: '1mb' }));
  app.use(requestLogger);

  app.use(
    '/health',
    createHealthRouter({
      config: appConfig,
      catalogConfigured: context.catalog !== null,
      isScanning: () => context.scanService?.isScanning() ?? false,
    }),
  );

  app.use('/api', authMiddleware);
  app.use(
    '/api/libraries',
    createLibrariesRouter({
      catalog: context.catalog,
      groups: repositories.groups,
      preferences: repositories.preferences,
    }),
  );
  app.use('/api/scans', createScansRouter({ scanService: context.scanService, jobs: repositories.jobs }));
  app.use('/api/audit', createAuditRouter({ audit: repositories.audit }));

  app.use(errorHandler);

  return app;
};

export const createServer = (appConfig: AppConfig, deps: ServerDependencies = {}) =>
  createApp(createAppContext(appConfig, deps));

export default createServer;
