#!/usr/bin/env node
/**
 * CLI for fetching FPL API and Understat datasets.
 *
 * Usage:
 *   npm run fetch -- --resource fpl_bootstrap --out data/raw/fpl_bootstrap.json
 *   npm run fetch -- --resource fpl_histories --limit 25 --out data/raw/fpl_histories_sample.csv
 *   npm run fetch -- --resource understat_players --season 2023 --out data/raw/understat_players_2023.csv
 *   npm run fetch -- --list
 */

import { parseCliArgs } from './cli-args.js'
import { loadConfig, loadEnvFile } from './config.js'
import { UsageError } from './core/errors.js'
import { listResources, runResource } from './core/runner.js'

function printUsage() {
  console.log(`
Usage:
  npm run fetch -- --resource <name> --out <path> [options]
  npm run fetch -- --list

Options:
  --resource <name>   ${listResources().join(' | ')}
  --out <path>        Output file (.csv, .json, .parquet or .pq; JSON resources are always written as JSON)
  --season <year>     Understat season (default: 2023)
  --league <code>     Understat league code (default: EPL)
  --limit <n>         Only the first n players for fpl_histories (n >= 0)
  --sleep <seconds>   Pause between FPL history requests (default: FPL_SLEEP_SEC or 0.35)
`)
}

async function main() {
  const command = parseCliArgs(process.argv.slice(2), listResources())
  if (command.kind === 'list') {
    console.log('Available resources:')
    for (const name of listResources()) console.log(`  ${name}`)
    return
  }

  loadEnvFile()
  const config = loadConfig()

  const result = await runResource(command.resource, command.options, config)
  const rows = result.rowCount === null ? '' : `, ${result.rowCount} rows`
  console.log(`Done: ${result.resource} -> ${result.outPath}${rows} in ${(result.durationMs / 1000).toFixed(1)}s`)
}

main().catch(err => {
  if (err instanceof UsageError) {
    console.error(`Error: ${err.message}`)
    printUsage()
  } else {
    console.error('Fatal error:', err)
  }
  process.exit(1)
})
