/**
 * Compiles a chain-set JSON file and prints the engine network.
 *
 *   tsx scripts/compile_network.ts tests/fixtures/preinsulin.json [--no-resources] [--lint] [--out net.json]
 *
 * Diagnostics go to stderr; the network JSON goes to stdout (or --out).
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { loadChainSetFile } from '../services/chainSetLoader';
import { compileChainSet } from '../services/translation/compileChainSet';
import { toEngineNetwork } from '../services/translation/EngineExport';
import { isNetworkCompilationError } from '../services/translation/errors';
import { formatLintResults, lintNetwork } from '../services/networkLinter';

const args = process.argv.slice(2);
const hasFlag = (name: string): boolean => args.includes(name);
const getArg = (name: string): string | null => {
  const idx = args.indexOf(name);
  return idx === -1 ? null : args[idx + 1] ?? null;
};

async function main(): Promise<void> {
  const input = args.find((a, i) => !a.startsWith('--') && args[i - 1] !== '--out');
  if (!input) {
    console.error('Usage: tsx scripts/compile_network.ts <chain-set.json> [--no-resources] [--lint] [--out file]');
    process.exitCode = 2;
    return;
  }

  const chainSet = await loadChainSetFile(path.resolve(input));
  const network = compileChainSet(chainSet, hasFlag('--no-resources') ? { withResources: false } : {});

  if (hasFlag('--lint')) {
    const result = lintNetwork(network, chainSet.chains);
    console.error(formatLintResults(result));
    if (result.summary.errors > 0) process.exitCode = 1;
  }

  const json = JSON.stringify(toEngineNetwork(network), null, 2);
  const out = getArg('--out');
  if (out) {
    fs.writeFileSync(path.resolve(out), json + '\n');
    console.error(`[compile_network] ${Object.keys(network.places).length} places, ${Object.keys(network.transitions).length} transitions -> ${out}`);
  } else {
    console.log(json);
  }
}

main().catch((e: unknown) => {
  if (isNetworkCompilationError(e)) {
    console.error(`[compile_network] ${e.name} (${e.code}): ${e.message}`);
  } else {
    console.error(e);
  }
  process.exit(1);
});
