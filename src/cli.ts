#!/usr/bin/env node
/**
 * BrainLift CLI
 * brainlift: sign in with Google and read BrainLifts from the terminal
 */

import { Command } from 'commander';
import { createConfigCommand } from './commands/config.js';
import { createAuthCommand } from './commands/auth.js';
import { createBrainliftsCommand } from './commands/brainlifts.js';
import { VERSION } from './version.js';

const program = new Command();

program
    .name('brainlift')
    .description('BrainLift MCP: CLI for BrainLift sign-in and data')
    .version(VERSION);

program.addCommand(createConfigCommand());
program.addCommand(createAuthCommand());
program.addCommand(createBrainliftsCommand());

await program.parseAsync();
