#!/usr/bin/env node
/**
 * Main entry point for the console launcher. Boots up the app and runs until the user quits.
 */

import { LauncherApp } from './App.js';
import { FormatError } from './Common/Errors.js';

async function main(): Promise<void> {
    try {
        const app = new LauncherApp();
        await app.Start();
    } catch (err) {
        console.error(`Fatal error during launcher startup: ${FormatError(err)}`);
        process.exit(1);
    }
}

void main();
