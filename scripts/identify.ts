import { config } from '../src/config';
import { getDb } from '../src/db';
import { Identification, createIdentificationService } from '../src/services/identification';

function usage(): never {
  console.log('Usage: npm run identify -- [--jobs <n>] <release name> [<release name> ...]');
  process.exit(1);
}

function parseArgs(argv: string[]): { names: string[]; jobs: number } {
  const names: string[] = [];
  let jobs = 3;
  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === '--jobs' || argv[i] === '-j') {
      const value = parseInt(argv[++i] ?? '', 10);
      if (!Number.isFinite(value) || value < 1) usage();
      jobs = value;
    } else {
      names.push(argv[i]);
    }
  }
  return { names, jobs };
}

function describe(identification: Identification): string {
  const { name, parsed, outcome } = identification;
  const lines = [`${name}`, `  parsed: "${parsed.rawTitle}" (${parsed.contentType}${parsed.year ? `, ${parsed.year}` : ''})`];

  switch (outcome.status) {
    case 'resolved': {
      const { result, fromCache } = outcome;
      const source = fromCache ? 'cache' : `${result.attempts} attempt(s), query "${result.queryUsed}"`;
      if (result.candidate) {
        const c = result.candidate;
        lines.push(
          `  match:  [${result.confidence}] ${c.title}${c.releaseYear ? ` (${c.releaseYear})` : ''} ` +
            `tmdb:${c.mediaType}/${c.externalId} score ${c.score.toFixed(3)} via ${source}`
        );
        if (c.genres?.length || c.imdbId) {
          lines.push(`  info:   ${[c.imdbId, c.genres?.join(', ')].filter(Boolean).join(' | ')}`);
        }
        if (c.episodeName) {
          lines.push(`  episode: ${c.episodeName}`);
        }
      } else {
        lines.push(`  match:  none via ${source}`);
      }
      break;
    }
    case 'transient_error':
      lines.push(`  error:  ${outcome.message} (after ${outcome.attempts} attempt(s), not cached)`);
      break;
    case 'cancelled':
      lines.push('  cancelled');
      break;
  }
  return lines.join('\n');
}

async function main() {
  const { names, jobs } = parseArgs(process.argv.slice(2));
  if (names.length === 0) usage();

  const service = createIdentificationService(config, getDb());
  const controller = new AbortController();
  process.on('SIGINT', () => {
    console.log('\nInterrupted, cancelling pending lookups...');
    controller.abort();
  });

  const results = await service.identifyMany(names, { concurrency: jobs, signal: controller.signal });
  for (const identification of results) {
    console.log(describe(identification));
  }

  const failed = results.filter((r) => r.outcome.status !== 'resolved').length;
  getDb().close();
  process.exit(failed > 0 ? 2 : 0);
}

main().catch((error) => {
  console.error('Identify failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
