import { z } from 'zod';
import { STANDARD_GRAVITY } from '../engine/kinematics/axis-state.js';

export const ServerConfigSchema = z.object({
    dbPath: z.string().min(1).optional()
        .describe('SQLite file for the audit and event logs; ":memory:" keeps them in process'),
    gravity: z.coerce.number().positive().finite().default(STANDARD_GRAVITY)
        .describe('Magnitude g of the default vertical acceleration a_y = -g')
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

export function readArg(argv: readonly string[], flag: string): string | undefined {
    const index = argv.indexOf(flag);
    if (index === -1) return undefined;
    return argv[index + 1];
}

/**
 * Priority per setting: environment variable, then command-line flag, then default.
 */
export function loadConfig(argv: readonly string[] = process.argv, env: NodeJS.ProcessEnv = process.env): ServerConfig {
    return ServerConfigSchema.parse({
        dbPath: env.KINEMATICS_MCP_DB_PATH || readArg(argv, '--db-path'),
        gravity: env.KINEMATICS_GRAVITY || readArg(argv, '--gravity')
    });
}
