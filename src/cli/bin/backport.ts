#!/usr/bin/env tsx
// src/cli/bin/backport.ts
// CLI bootstrap (executes the parser).
import { CommanderError } from 'commander';

import { error as red } from '@/installer/util/color';

import { makeCli } from '..';

void makeCli()
  .parseAsync()
  .catch((e: unknown) => {
    // commander has already printed its own message
    if (e instanceof CommanderError) {
      process.exitCode = e.exitCode;
      return;
    }
    console.error(red(`backport: ${e instanceof Error ? e.message : String(e)}`));
    process.exitCode = 1;
  });
