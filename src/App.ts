/**
 * @fileoverview Application shell: loads configuration and runs the orchestrator.
 * @module App
 * @version 1.0.0
 */

import { loadConfig, type Environment } from './config';
import { AppOrchestrator, type OrchestratorDependencies } from './Orchestrator';

export class App {
    private _orchestrator: AppOrchestrator | null = null;

    /**
     * Load configuration and start every module.
     * @throws ConfigError when the configuration is missing or invalid
     */
    async start(
        argv: readonly string[] = process.argv.slice(2),
        env: Environment = process.env,
        dependencies: OrchestratorDependencies = {}
    ): Promise<void> {
        const { config, path } = await loadConfig(argv, env);
        console.info(`[App] Using configuration ${path}`);

        const orchestrator = new AppOrchestrator();
        this._orchestrator = orchestrator;
        await orchestrator.initialize(config, dependencies);
        await orchestrator.start();
    }

    async shutdown(): Promise<void> {
        const orchestrator = this._orchestrator;
        this._orchestrator = null;
        if (orchestrator) {
            await orchestrator.shutdown();
        }
    }

    getOrchestrator(): AppOrchestrator | null {
        return this._orchestrator;
    }
}
