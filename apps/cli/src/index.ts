#!/usr/bin/env node

import { loadConfig, resolveDataFile, TaskStore, today } from '@kelvin/core';
import { createProgram } from './program.js';
import { lazyContext } from './helpers.js';

const context = lazyContext(() => {
  const config = loadConfig();
  const store = new TaskStore(resolveDataFile(config));
  return { config, store, today: today() };
});

createProgram(context).parse();
