import { PutObjectCommand, type S3Client } from '@aws-sdk/client-s3';
import type { BillingRunResult } from '../types/billing';
import type { RunArchive } from '../types/services';

/**
 * Archive finished billing runs to MinIO (S3-compatible storage)
 *
 * Stores each run as a JSON file organized by date:
 * /billing-runs/YYYY/MM/DD/run_{id}.json
 *
 * The archive is the audit trail of what each run selected, invoiced and
 * skipped, independent of the accounting system.
 */
export class S3RunArchive implements RunArchive {
  constructor(
    private readonly client: S3Client,
    private readonly bucket: string,
    private readonly now: () => number = Date.now
  ) {}

  async archiveRun(result: BillingRunResult): Promise<string> {
    const key = runArchiveKey(result.run_id, this.now());

    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: JSON.stringify({
          archived_at: new Date(this.now()).toISOString(),
          ...result,
        }),
        ContentType: 'application/json',
      })
    );

    return key;
  }
}

export function runArchiveKey(runId: string, at: number): string {
  const date = new Date(at);
  const year = date.getUTCFullYear();
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  const day = String(date.getUTCDate()).padStart(2, '0');
  const id = runId.startsWith('run_') ? runId : `run_${runId}`;

  return `billing-runs/${year}/${month}/${day}/${id}.json`;
}
