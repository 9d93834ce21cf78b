/**
 * Seed Tariffs
 *
 * Loads the default tariff catalog for a company. Existing rules with the
 * same id are overwritten, so the script can be re-run after catalog edits.
 *
 * Run: npm run seed-tariffs -- <company_id> [currency]
 */

import { redis, initRedis } from '../src/config/redis';
import { createServices } from '../src/config/services';
import { getDefaultTariffs } from '../src/config/tariffs';
import { validateTariffRule } from '../src/utils/tariff';

function log(label: string, message: string) {
  console.log(`${label}  ${message}`);
}

async function main(): Promise<void> {
  const [companyId, currency] = process.argv.slice(2);
  if (!companyId) {
    throw new Error('Usage: seed-tariffs <company_id> [currency]');
  }

  await initRedis();
  const services = createServices();

  for (const rule of getDefaultTariffs(companyId, currency)) {
    validateTariffRule(rule);
    await services.tariffs.save(rule);
    log('OK', `${rule.id}  ${rule.name}  (${rule.rate} ${rule.currency}/${rule.basis}/day)`);
  }
}

main()
  .then(async () => {
    await redis.quit();
  })
  .catch(async (err: unknown) => {
    log('FAIL', err instanceof Error ? err.message : String(err));
    await redis.quit();
    process.exit(1);
  });
