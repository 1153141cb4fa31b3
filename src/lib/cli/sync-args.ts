import { configError } from '@/lib/config/load-json';
import { ErrorCode } from '@/lib/errors/error-codes';
import { isSourceName } from '@/lib/ingest/raw-record';

import type { SourceName } from '@/lib/ingest/raw-record';

export type SyncCliOptions = {
  source: SourceName;
  /** Native dump to read; not used for the static source. */
  input: string | null;
  store: string;
  overridesPath?: string;
  rulesPath?: string;
  fields?: string[];
  since: Date | null;
  runId?: string;
  debug: boolean;
};

export const SYNC_USAGE =
  'usage: sync --source <static|mdm|snmp|scan> [--input <dump.json>] --store <inventory.json> ' +
  '[--overrides <file>] [--rules <file>] [--fields a,b,c] [--since <iso>] [--run-id <id>] [--debug]';

function invalid(message: string, value: string) {
  return configError(ErrorCode.CONFIG_INVALID, message, { value, usage: SYNC_USAGE });
}

function splitCsv(value: string): string[] {
  return value
    .split(',')
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
}

export function parseSyncArgs(argv: readonly string[], debugDefault = false): SyncCliOptions {
  let source: SourceName | undefined;
  let input: string | null = null;
  let store: string | undefined;
  let overridesPath: string | undefined;
  let rulesPath: string | undefined;
  let fields: string[] | undefined;
  let since: Date | null = null;
  let runId: string | undefined;
  let debug = debugDefault;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i] ?? '';
    if (arg === '--debug') {
      debug = true;
      continue;
    }

    const value = argv[i + 1];
    if (value === undefined || value.startsWith('--')) throw invalid(`missing value for ${arg}`, arg);
    i += 1;

    switch (arg) {
      case '--source': {
        const name = value.trim().toLowerCase();
        if (!isSourceName(name)) throw invalid(`unknown source: ${value}`, value);
        source = name;
        break;
      }
      case '--input':
        input = value;
        break;
      case '--store':
        store = value;
        break;
      case '--overrides':
        overridesPath = value;
        break;
      case '--rules':
        rulesPath = value;
        break;
      case '--fields':
        fields = splitCsv(value);
        break;
      case '--since': {
        const parsed = new Date(value);
        if (!Number.isFinite(parsed.getTime())) throw invalid(`invalid --since timestamp: ${value}`, value);
        since = parsed;
        break;
      }
      case '--run-id':
        runId = value;
        break;
      default:
        throw invalid(`unknown argument: ${arg}`, arg);
    }
  }

  if (!source) throw invalid('missing required argument: --source', '');
  if (!store) throw invalid('missing required argument: --store', '');
  if (source !== 'static' && !input) throw invalid(`--input is required for source ${source}`, source);

  return {
    source,
    input: source === 'static' ? null : input,
    store,
    since,
    debug,
    ...(overridesPath ? { overridesPath } : {}),
    ...(rulesPath ? { rulesPath } : {}),
    ...(fields ? { fields } : {}),
    ...(runId ? { runId } : {}),
  };
}
