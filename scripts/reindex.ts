import { loadConfig } from '../src/config.js';
import { createRuntime } from '../src/runtime.js';

const args = process.argv.slice(2);
const reset = args.includes('--reset');

const config = loadConfig();
const { service, records } = await createRuntime(config);

console.error(`Rebuilding vector index from the record store${reset ? ' (collections reset)' : ''} ...`);
const result = await service.reindex(reset);
records.close();

if (result.status === 'error') {
  console.error(`${result.message}: ${JSON.stringify(result.error_details)}`);
  process.exit(1);
}
console.error(`Done: ${result.memories} memories, ${result.summaries} summaries, ${result.topics} topics`);
