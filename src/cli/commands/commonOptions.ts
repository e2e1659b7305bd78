import type { Command } from 'commander';

/** Options every experiment command accepts. */
export function withRunOptions(cmd: Command): Command {
  return cmd
    .option('-r, --results <dir>', 'Results directory (default: $HARNESS_RESULTS_DIR or ./results)')
    .option('--store <kind>', 'Store backend: lancedb|memory (default: $HARNESS_STORE or lancedb)')
    .option('--corpus <file>', 'Corpus spec JSON (default: bundled data/corpus.json)')
    .option('--queries <file>', 'Query set JSON (default: bundled data/queries.json)');
}
