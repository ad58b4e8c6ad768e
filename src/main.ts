#!/usr/bin/env node
import { main } from '@/labelops';

main().then(
    (code) => {
        process.exit(code);
    },
    (error: unknown) => {
        process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
        process.exit(1);
    },
);
