import { buildServer } from './server';
import { initRedis } from '../config/redis';
import { initClickHouse } from '../config/clickhouse';
import { initMinio } from '../config/minio';
import { createServices } from '../config/services';
import { logger } from '../config/logger';

const PORT = parseInt(process.env.PORT || '3000', 10);
const HOST = process.env.HOST || '0.0.0.0';

// Start server
const start = async () => {
  try {
    // Initialize storage backends
    await initRedis();
    await initClickHouse();
    await initMinio();

    const app = buildServer(createServices());
    await app.listen({ port: PORT, host: HOST });
  } catch (err) {
    logger.error({ err }, 'failed to start server');
    process.exit(1);
  }
};

void start();
