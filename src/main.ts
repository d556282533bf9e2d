#!/usr/bin/env node
import 'dotenv/config';
import { run } from '@/cli';

run().catch((error: unknown) => {
    process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exit(1);
});
