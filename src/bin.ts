#!/usr/bin/env node
import * as dotenv from 'dotenv';
import { runCli } from './cli';
import { AnalysisError } from './errors';

dotenv.config();

runCli(process.argv.slice(2)).catch(error => {
  if (error instanceof AnalysisError) {
    console.error(`Error [${error.code}]: ${error.message}`);
  } else {
    console.error('Fatal error:', error);
  }
  process.exit(1);
});
