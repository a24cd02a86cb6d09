#!/usr/bin/env node
import { EXIT_CODES } from '../config/defaults';
import { main } from './main';

main().then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = EXIT_CODES.FAILURE;
  }
);
