#!/usr/bin/env node
import { main } from './src/cli.js';

main(process.argv.slice(2))
    .then(code => {
        process.exitCode = code;
    })
    .catch(err => {
        console.error('Build failed:', err);
        process.exitCode = 1;
    });
