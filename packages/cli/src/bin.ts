#!/usr/bin/env node

import { run } from './run.js';

run(process.argv.slice(2), {
    out: (line) => console.log(line),
    err: (line) => console.error(line)
}).then(
    (code) => {
        process.exitCode = code;
    },
    (err: unknown) => {
        console.error('Fatal:', err instanceof Error ? err.message : String(err));
        process.exitCode = 1;
    }
);
