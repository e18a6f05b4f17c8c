import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { createApp } from './app.js';
import { resolveOutputRoot } from './analyzer/defaults.js';
import { RunRegistry } from './analyzer/runRegistry.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const repoRoot = path.resolve(__dirname, '..', '..');
const app = createApp({ registry: new RunRegistry(repoRoot, resolveOutputRoot()) });

const port = Number(process.env.PORT ?? 3001);
app.listen(port, () => {
  // eslint-disable-next-line no-console
  console.log(`Call stack API listening on http://localhost:${port}`);
});
