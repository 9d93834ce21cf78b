/**
 * Scheduled Billing Sweep
 *
 * Invoices every active contract whose next invoice date has come, then
 * warns about open intakes past their planned release time.
 * Meant to run once a day from cron or a scheduler.
 *
 * Run: npm run billing-sweep [-- --date=YYYY-MM-DD]
 */

import { redis, initRedis } from '../src/config/redis';
import { createServices } from '../src/config/services';
import { logger } from '../src/config/logger';
import { runContractSweep } from '../src/utils/contract';
import { findOverdueIntakes } from '../src/utils/intake';
import { startOfDay, toDateString } from '../src/utils/dates';

function parseDateArg(argv: string[]): string | undefined {
  const arg = argv.find((a) => a.startsWith('--date='));
  return arg?.slice('--date='.length);
}

async function main(): Promise<number> {
  await initRedis();
  const services = createServices();

  const today = parseDateArg(process.argv.slice(2)) ?? toDateString(services.now());
  startOfDay(today);

  const sweep = await runContractSweep(today, services);
  logger.info(
    {
      date: today,
      processed: sweep.processed,
      invoiced: sweep.invoiced.length,
      failed: sweep.failed.length,
    },
    'contract sweep finished'
  );

  const overdue = findOverdueIntakes(await services.intakes.list(), services.now());
  for (const intake of overdue) {
    logger.warn(
      {
        intake_id: intake.id,
        name: intake.name,
        customer_id: intake.customer_id,
        planned_date_out: intake.planned_date_out,
      },
      'intake past planned release'
    );
  }

  return sweep.failed.length > 0 ? 1 : 0;
}

main()
  .then(async (code) => {
    await redis.quit();
    process.exit(code);
  })
  .catch(async (err) => {
    logger.error({ err }, 'billing sweep failed');
    await redis.quit();
    process.exit(1);
  });
