/**
 * @fileoverview Map Host - Main Entry Point
 *
 * Loads the configuration, builds the host around a PluginManager and
 * keeps the plugins running until the process is interrupted.
 *
 * Startup order:
 * 1. Built-in plugins (SQLite provider, measure and select tools, statistics)
 * 2. Plugins discovered in the configured plugin directories
 * 3. startAll() in dependency order
 * 4. Layers configured in host.yml, read through the data providers
 *
 * @module mapcore-host
 */

// Load .env before any other imports that depend on environment variables
import "dotenv/config";

import { join, dirname } from "path";
import { fileURLToPath } from "url";

import { describeError } from "@mapcore/engine";
import { loadHostConfigWithFallback } from "./config/index.js";
import { createHost, startHost, stopHost, type Host } from "./host.js";

// Get directory of this file
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Log manager events for observability.
 */
function subscribeToEvents(host: Host): void {
    const { eventBus } = host.manager;

    eventBus.subscribe("engine:started", (event) => {
        host.logger.info("Engine started", event.data);
    });

    eventBus.subscribe("engine:stopped", () => {
        host.logger.info("Engine stopped");
    });

    eventBus.subscribe("plugin:stateChanged", (event) => {
        host.logger.debug("Plugin state changed", event.data);
    });

    eventBus.subscribe("plugin:rejected", (event) => {
        host.logger.warn("Plugin rejected", event.data);
    });

    eventBus.subscribe("plugin:error", (event) => {
        host.logger.error("Plugin error", event.data);
    });
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
    const configPath = process.env.MAPCORE_CONFIG ?? join(__dirname, "..", "config", "host.yml");
    const config = loadHostConfigWithFallback(configPath);

    const host = createHost(config);
    host.logger.info(`Map host starting (engine ${host.manager.engineVersion})`);
    subscribeToEvents(host);

    // Nothing else holds the event loop open once plugins are started
    const heartbeat = setInterval(() => {
        host.logger.debug("Heartbeat", { started: host.manager.startOrder.length, layers: host.layers.count });
    }, 60_000);

    // Handle graceful shutdown
    let stopping = false;
    const shutdown = (signal: string) => {
        if (stopping) {
            return;
        }
        stopping = true;
        clearInterval(heartbeat);
        host.logger.info(`Received ${signal}, shutting down`);
        stopHost(host).then(
            () => process.exit(0),
            (error: unknown) => {
                host.logger.error("Shutdown failed", { error: describeError(error) });
                process.exit(1);
            }
        );
    };

    process.on("SIGINT", () => shutdown("SIGINT"));
    process.on("SIGTERM", () => shutdown("SIGTERM"));

    const report = await startHost(host, config);

    host.logger.info("Map host is running. Press Ctrl+C to stop.", {
        plugins: host.manager.startOrder,
        failed : report.start.failed.map(f => f.pluginId),
        layers : report.layers,
    });
}

main().catch((error: unknown) => {
    console.error("[FATAL] Failed to start map host:", error);
    process.exit(1);
});
