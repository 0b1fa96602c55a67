/**
 * Run one market search from the command line and print the result as JSON.
 *
 * Usage: npm run search -- "bitcoin 200k 2027"
 */

import { initializeEnv, loadSearchConfig } from "../config/env";
import { createMarketSearch } from "../src/search";
import type { SearchResult } from "../src/search";

function toJson(outcome: SearchResult): unknown {
  if (!outcome.success) {
    return { error: outcome.error.kind, message: outcome.error.message };
  }
  return {
    catalogSize: outcome.catalogSize,
    stale: outcome.stale,
    result: outcome.result,
  };
}

async function main(): Promise<void> {
  initializeEnv();

  const query = process.argv.slice(2).join(" ");
  const search = createMarketSearch(loadSearchConfig());
  const outcome = await search.search(query);

  console.log(JSON.stringify(toJson(outcome), null, 2));
  process.exitCode = outcome.success ? 0 : 1;
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
