import { exitCodeFor, runSyncCli } from '@/lib/cli/run-sync';
import { parseSyncArgs, SYNC_USAGE } from '@/lib/cli/sync-args';
import { serverEnv } from '@/lib/env/server';
import { causeOf, toPublicError } from '@/lib/errors/error';
import { logEvent } from '@/lib/logging/logger';

async function main() {
  const options = parseSyncArgs(process.argv.slice(2), serverEnv.DEVICE_RECONCILE_DEBUG);

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  const outcome = await runSyncCli(options, { signal: controller.signal });
  process.exitCode = exitCodeFor(outcome.status);
}

main().catch((err) => {
  logEvent({
    event_type: 'cli.sync_failed',
    level: 'error',
    service: 'cli',
    error: toPublicError(err),
    cause: causeOf(err),
    usage: SYNC_USAGE,
  });
  process.exit(1);
});
