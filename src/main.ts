#!/usr/bin/env node
import * as dotenv from 'dotenv';
import { createProgram, UNHANDLED_ERROR } from './cli/program';
import { errorMessage } from './utils';

// Load environment variables from .env file
dotenv.config();

async function main() {
    const program = createProgram();
    await program.parseAsync(process.argv);
}

main().catch(error => {
    // Errors not handled by a command action, e.g. from argument parsing
    console.error(`Unhandled application error: ${errorMessage(error)}`);
    process.exit(UNHANDLED_ERROR);
});
