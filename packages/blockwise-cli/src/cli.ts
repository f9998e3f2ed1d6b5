#!/usr/bin/env node
import { parseRequestedFormat, run } from './index.js';
import { handleError } from './errors.js';

run().catch((error: unknown) => {
  handleError(error, parseRequestedFormat(process.argv.slice(2)) === 'json');
});
