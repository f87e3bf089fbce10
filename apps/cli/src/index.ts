#!/usr/bin/env node

import { loadConfig, createLogger } from '@taskdeck/core';
import { createProgram } from './program.js';

const config = loadConfig();
const logger = createLogger({ name: 'taskdeck-cli', level: config.debug ? 'debug' : 'warn', pretty: config.debug });

const { program, context } = createProgram(config, logger);

program.hook('postAction', (_thisCommand, actionCommand) => {
  if (actionCommand.name() !== 'serve') context.close();
});

await program.parseAsync();
