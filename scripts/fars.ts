#!/usr/bin/env node
import { writeFileSync } from 'node:fs';

import { buildApp } from '../src/app/build-app.js';
import { createProgram } from '../src/cli/program.js';
import { createConfig, parseEnv } from '../src/infra/config/env.js';
import { createLogger } from '../src/infra/logger/index.js';

const main = (): void => {
  const config = createConfig(parseEnv(process.env));
  const logger = createLogger({ ...config.logger, fd: 2 });
  const app = buildApp({ config, logger });

  const program = createProgram({
    app,
    out: (text) => {
      process.stdout.write(`${text}\n`);
    },
    fail: (message) => {
      process.stderr.write(`${message}\n`);
      process.exitCode = 1;
    },
    writeFile: (filePath, contents) => {
      writeFileSync(filePath, contents, 'utf8');
    },
    defaultPlotOutput: config.plot.output,
  });

  program.parse(process.argv);
};

try {
  main();
} catch (error: unknown) {
  process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
}
