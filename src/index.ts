#!/usr/bin/env node
/**
 * @fileoverview Application entry point.
 * @module index
 * @version 1.0.0
 */

import { App } from './App';
import { summarizeErrorForLog } from './types';

// ============================================
// Global Error Handling
// ============================================

function handleUnhandledRejection(reason: unknown): void {
    console.error('Unhandled promise rejection:', summarizeErrorForLog(reason));
}

/** Shuts the app down and exits with status 1. */
function handleUncaughtException(error: Error): void {
    console.error('Uncaught error:', summarizeErrorForLog(error));
    shutdownAndExit(1);
}

// ============================================
// Application Bootstrap
// ============================================

let app: App | null = null;
let stopping = false;

async function bootstrap(): Promise<void> {
    console.info('[Minaret] Starting...');

    try {
        app = new App();
        await app.start();
        console.info('[Minaret] Started successfully');
    } catch (error) {
        console.error('Failed to start Minaret:', summarizeErrorForLog(error));
        await cleanup();
        process.exitCode = 1;
    }
}

async function cleanup(): Promise<void> {
    if (app) {
        console.info('[Minaret] Shutting down...');
        await app.shutdown();
        app = null;
        console.info('[Minaret] Shut down complete');
    }
}

function handleSignal(signal: NodeJS.Signals): void {
    console.info(`[Minaret] Received ${signal}`);
    shutdownAndExit(0);
}

function shutdownAndExit(code: number): void {
    if (stopping) {
        return;
    }
    stopping = true;
    cleanup().then(
        () => process.exit(code === 0 ? (process.exitCode ?? 0) : code),
        (error: unknown) => {
            console.error('Shutdown failed:', summarizeErrorForLog(error));
            process.exit(1);
        }
    );
}

if (require.main === module) {
    process.on('unhandledRejection', handleUnhandledRejection);
    process.on('uncaughtException', handleUncaughtException);
    process.on('SIGINT', handleSignal);
    process.on('SIGTERM', handleSignal);
    bootstrap().catch((error: unknown) => {
        console.error('Bootstrap failed:', summarizeErrorForLog(error));
        process.exitCode = 1;
    });
}

// Export for testing
export { app, bootstrap, cleanup };
