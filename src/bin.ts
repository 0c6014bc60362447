#!/usr/bin/env node
import chalk from 'chalk';
import { runCli } from './cli.js';

async function readStdin(): Promise<string> {
    process.stdin.setEncoding('utf-8');
    let data = '';
    for await (const chunk of process.stdin) {
        data += String(chunk);
    }
    return data;
}

runCli(process.argv.slice(2), {
    stdout: line => console.log(line),
    stderr: line => console.error(line),
    readStdin,
    env: process.env,
    color: chalk.level > 0,
}).then(code => {
    process.exitCode = code;
}).catch(error => {
    console.error('Fatal error:', error);
    process.exitCode = 1;
});
