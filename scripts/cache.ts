import { getDb } from '../src/db';
import { config } from '../src/config';
import { SqliteLookupCache } from '../src/models/lookupCache';

const command = process.argv[2];
const cache = new SqliteLookupCache(getDb());

switch (command) {
  case 'stats': {
    const stats = cache.stats();
    const lookups = stats.hitCount + stats.missCount;
    console.log(`Lookup cache (${config.db.path})`);
    console.log(`  Entries:   ${stats.entryCount}`);
    console.log(`  Expired:   ${stats.expiredCount}`);
    console.log(`  Hits:      ${stats.hitCount}`);
    console.log(`  Misses:    ${stats.missCount}`);
    console.log(`  Hit rate:  ${lookups > 0 ? ((stats.hitCount / lookups) * 100).toFixed(1) : '0.0'}%`);
    break;
  }
  case 'clear':
    cache.clear();
    console.log('✅ Lookup cache cleared.');
    break;
  default:
    console.log('Usage: tsx scripts/cache.ts <stats|clear>');
    process.exit(1);
}

getDb().close();
