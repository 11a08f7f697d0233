import { readFile } from "node:fs/promises";

import { loadConfig } from "./config.js";
import { createInMemoryEngine } from "./http/engine.js";
import { startServer } from "./http/server.js";

const config = loadConfig();

const corpus = config.dictionaryPath ? await readFile(config.dictionaryPath) : new Uint8Array(0);
const engine = createInMemoryEngine(corpus, { strategy: config.strategy });

const { server, port } = await startServer({
  port: config.port,
  metricsEnabled: config.metricsEnabled,
  engine,
  defaultMaxNgramSize: config.defaultMaxNgramSize,
});

function shutdown(): void {
  server.close(() => process.exit(0));
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

const { entryCount, corpusBytes } = engine.stats();
console.log(`listening on :${port} (${entryCount} entries from ${config.dictionaryPath ?? "empty corpus"}, ${corpusBytes} bytes, ${config.strategy} strategy)`);
