#!/usr/bin/env node

import { config } from 'dotenv';
import { createSyncCommand } from '@/cli/commands/sync';

// Load environment variables from .env
config();

createSyncCommand()
  .parseAsync()
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
