import { Router } from 'express';
import type { HealthStatus } from '@reelsift/shared';

import type { AppConfig } from '../config/index.js';

export interface HealthResponse extends HealthStatus {
  status: 'ok' | 'degraded';
  timestamp: string;
  environment: AppConfig['runtime']['env'];
}

export interface HealthRouterOptions {
  config: AppConfig;
  catalogConfigured: boolean;
  isScanning: () => boolean;
}

export const createHealthRouter = ({ config, catalogConfigured, isScanning }: HealthRouterOptions) => {
  const router = Router();

  router.get('/', (_req, res) => {
    const payload: HealthResponse = {
      status: catalogConfigured ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      environment: config.runtime.env,
      details: {
        catalogConfigured,
        scannerEnabled: config.scanner.enabled,
        scanning: isScanning(),
        dryRun: config.scanner.dryRun,
      },
    };

    res.json(payload);
  });

  return router;
};

export default createHealthRouter;
