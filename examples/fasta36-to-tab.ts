#!/usr/bin/env -S npx tsx

/**
 * Converts a FASTA36 `-m 0` alignment report into a tab-separated table
 *
 * One row per alignment: identity, coordinates, scores, the aligned query
 * and subject, and a regenerated match pattern.
 *
 * Usage: npx tsx examples/fasta36-to-tab.ts -i <report> -o <table> [options]
 *
 * Examples:
 *   npx tsx examples/fasta36-to-tab.ts -i search.m0.txt -o hits.tsv
 *   npx tsx examples/fasta36-to-tab.ts -i search.m0.txt.gz -o hits.tsv --extended
 *   npx tsx examples/fasta36-to-tab.ts -i search.m0.txt -o hits.tsv --matrix blosum62
 *   npx tsx examples/fasta36-to-tab.ts -i search.m0.txt -o hits.tsv --columns query,subject,evalue
 */

import {
  type BlockRejection,
  type ColumnName,
  type ConvertOptions,
  convertFile,
  getErrorSuggestion,
  isScoringTableName,
  loadScoringTable,
  PairtabError,
  parseColumnList,
} from '../src';

interface CliOptions {
  input: string;
  output: string;
  columns?: ColumnName[];
  extended?: boolean;
  matrix?: string;
  strict?: boolean;
  quiet?: boolean;
  concurrency?: number;
}

function parseArguments(): CliOptions {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    showHelp();
    process.exit(args.includes('--help') || args.includes('-h') ? 0 : 1);
  }

  let input: string | undefined;
  let output: string | undefined;
  const options: Omit<CliOptions, 'input' | 'output'> = {};

  const valueOf = (flag: string, index: number): string => {
    const value = args[index + 1];
    if (value === undefined || value.startsWith('-')) {
      console.error(`Error: ${flag} requires a value`);
      process.exit(1);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--input':
      case '-i':
        input = valueOf(arg, i++);
        break;
      case '--output':
      case '-o':
        output = valueOf(arg, i++);
        break;
      case '--columns':
      case '-c':
        options.columns = parseColumnList(valueOf(arg, i++));
        break;
      case '--extended':
      case '-e':
        options.extended = true;
        break;
      case '--matrix':
      case '-m':
        options.matrix = valueOf(arg, i++);
        break;
      case '--strict':
        options.strict = true;
        break;
      case '--quiet':
      case '-q':
        options.quiet = true;
        break;
      case '--concurrency':
      case '-j': {
        const value = Number.parseInt(valueOf(arg, i++), 10);
        if (!Number.isInteger(value) || value < 1) {
          console.error('Error: --concurrency must be a positive integer');
          process.exit(1);
        }
        options.concurrency = value;
        break;
      }
      default:
        console.error(`Error: Unknown option '${arg}'`);
        process.exit(1);
    }
  }

  if (input === undefined || output === undefined) {
    console.error('Error: both -i <report> and -o <table> are required');
    process.exit(1);
  }

  return { input, output, ...options };
}

function showHelp(): void {
  console.error(`FASTA36 report to table converter

Usage: npx tsx examples/fasta36-to-tab.ts -i <report> -o <table> [options]

Reads the pairwise alignment report written by fasta36, ssearch36 or
ggsearch36 with '-m 0' (gzip-compressed reports are accepted) and writes
one tab-separated row per alignment.

OPTIONS:
  --input, -i <file>        Alignment report (.gz accepted)
  --output, -o <file>       Table to write
  --columns, -c <list>      Comma-separated columns, e.g. query,subject,evalue
  --extended, -e            -m 8 columns plus similarity, gaps, lengths, alignment
  --matrix, -m <name|file>  blosum50, blosum62, nucleotide, or a JSON matrix file
                            (default: blosum50 for protein, nucleotide for DNA)
  --strict                  Stop at the first alignment that cannot be parsed
  --concurrency, -j <n>     Alignments assembled in parallel (default: 1)
  --quiet, -q               Do not report skipped alignments

Columns:
  query subject p_ident p_sim aln_len mismatches gaps gap_opens q_start q_end
  s_start s_end strand evalue bit_score score q_len s_len kind q_aln s_aln m_aln
`);
}

async function main(): Promise<void> {
  const cli = parseArguments();

  try {
    const rejections: BlockRejection[] = [];
    const options: ConvertOptions = {
      columns: cli.columns ?? (cli.extended === true ? 'extended' : 'default'),
      strict: cli.strict === true,
      onRejected: (rejection) => rejections.push(rejection),
      ...(cli.concurrency !== undefined && { concurrency: cli.concurrency }),
      writer: { createDirectories: true },
    };

    if (cli.matrix !== undefined) {
      options.scoringTable = isScoringTableName(cli.matrix)
        ? cli.matrix
        : await loadScoringTable(cli.matrix);
    }

    const startTime = performance.now();
    const stats = await convertFile(cli.input, cli.output, options);
    const seconds = ((performance.now() - startTime) / 1000).toFixed(2);

    if (cli.quiet !== true) {
      for (const rejection of rejections) {
        console.error(
          `Skipped ${rejection.queryId} vs ${rejection.subjectId} (line ${rejection.lineNumber}): ${rejection.error.message}`
        );
      }
    }

    console.error(
      `Converted ${stats.rows} of ${stats.blocks} alignments in ${seconds}s` +
        (stats.rejected > 0 ? ` (${stats.rejected} skipped)` : '')
    );
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    if (error instanceof PairtabError) {
      const suggestion = getErrorSuggestion(error);
      if (suggestion !== undefined) {
        console.error(`Hint: ${suggestion}`);
      }
    }
    process.exit(1);
  }
}

await main();
