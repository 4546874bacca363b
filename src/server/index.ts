import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import {
    KinematicsTools,
    configureKinematicsTools,
    handleSetValue,
    handleClearValue,
    handleSetPolar,
    handleClearPolar,
    handleReset,
    handleSnapshot,
    handleTrajectory
} from './kinematics-tools.js';
import { PubSub } from '../engine/pubsub.js';
import { registerEventTools } from './events.js';
import { AuditLogger } from './audit.js';
import { loadConfig } from './config.js';
import { Notifier, SessionContext, ToolRegistrar, ToolResponse, withSession } from './types.js';
import { closeDb, configureDbPath, getDbPath } from '../storage/index.js';

export const SERVER_NAME = 'kinematics-mcp';
export const SERVER_VERSION = '1.0.0';

/**
 * Close the log database on every way out of the process.
 */
function setupShutdownHandlers(): void {
    let isShuttingDown = false;

    const shutdown = (signal: string) => {
        if (isShuttingDown) return;
        isShuttingDown = true;

        console.error(`[Server] Received ${signal}, shutting down gracefully...`);

        try {
            closeDb();
            console.error('[Server] Shutdown complete');
            process.exit(0);
        } catch (e) {
            console.error('[Server] Error during shutdown:', e instanceof Error ? e.message : String(e));
            process.exit(1);
        }
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGHUP', () => shutdown('SIGHUP'));

    // Ctrl+Break on Windows
    if (process.platform === 'win32') {
        process.on('SIGBREAK', () => shutdown('SIGBREAK'));
    }

    process.on('uncaughtException', (error) => {
        console.error('[Server] Uncaught exception:', error);
        shutdown('uncaughtException');
    });

    process.on('unhandledRejection', (reason) => {
        console.error('[Server] Unhandled rejection:', reason);
        shutdown('unhandledRejection');
    });

    process.on('exit', (code) => {
        if (!isShuttingDown) {
            console.error(`[Server] Process exiting with code ${code}`);
            closeDb();
        }
    });
}

async function main() {
    setupShutdownHandlers();

    const config = loadConfig();
    if (config.dbPath) configureDbPath(config.dbPath);
    console.error(`[Server] Database path: ${getDbPath()}`);
    console.error(`[Server] Gravity: ${config.gravity} m/s^2`);

    const server = new McpServer({
        name: SERVER_NAME,
        version: SERVER_VERSION
    });
    const transport = new StdioServerTransport();

    const pubsub = new PubSub();
    configureKinematicsTools({ gravity: config.gravity, pubsub });

    const register: ToolRegistrar = (name, description, shape, handler) => {
        server.tool(name, description, shape, handler);
    };
    const notify: Notifier = ({ method, params }) =>
        transport.send({ jsonrpc: '2.0', method, params });

    registerEventTools(register, notify, pubsub);

    const auditLogger = new AuditLogger();

    const registerTool = (
        tool: { name: string; description: string; inputSchema: z.AnyZodObject },
        handler: (args: unknown, ctx: SessionContext) => Promise<ToolResponse>
    ) => register(
        tool.name,
        tool.description,
        tool.inputSchema.extend({ sessionId: z.string().optional() }).shape,
        auditLogger.wrapHandler(tool.name, withSession(tool.inputSchema, handler))
    );

    registerTool(KinematicsTools.SET_VALUE, handleSetValue);
    registerTool(KinematicsTools.CLEAR_VALUE, handleClearValue);
    registerTool(KinematicsTools.SET_POLAR, handleSetPolar);
    registerTool(KinematicsTools.CLEAR_POLAR, handleClearPolar);
    registerTool(KinematicsTools.RESET, handleReset);
    registerTool(KinematicsTools.SNAPSHOT, handleSnapshot);
    registerTool(KinematicsTools.TRAJECTORY, handleTrajectory);

    await server.connect(transport);
    console.error(`[Server] ${SERVER_NAME} v${SERVER_VERSION} running on stdio`);
}

main().catch((error) => {
    console.error('[Server] Fatal error in main():', error);
    process.exit(1);
});
