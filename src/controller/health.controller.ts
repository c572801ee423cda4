import { Request, Response } from 'express';

export type DatabaseHealthCheck = () => Promise<{ status: string; latency?: number }>;

export const createHealthController = (serviceName: string, checkDatabase: DatabaseHealthCheck) => {

  const getHealth = async (_req: Request, res: Response): Promise<void> => {
    const database = await checkDatabase();
    const healthy = database.status === 'healthy';

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'ok' : 'degraded',
      database,
      timestamp: new Date().toISOString(),
      service: serviceName
    });
  };

  return { getHealth };
};
