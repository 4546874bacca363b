import { z } from 'zod';
import {
    AxisSchema,
    RoleSchema,
    PolarQuantitySchema,
    NumericInputSchema,
    KinematicsSnapshot
} from '../schema/kinematics.js';
import { KinematicsSession } from '../engine/kinematics/session.js';
import { STANDARD_GRAVITY } from '../engine/kinematics/axis-state.js';
import { DEFAULT_TRAJECTORY_SAMPLES } from '../engine/kinematics/derived.js';
import { parseNumericInput } from '../engine/kinematics/input.js';
import { PubSub } from '../engine/pubsub.js';
import { ExportEngine, ExportFormat, ExportFormatSchema, formatNumber } from '../math/export.js';
import { EventLogRepository } from '../storage/event-log.repo.js';
import { getDb } from '../storage/index.js';
import { SessionContext, ToolResponse, textResponse } from './types.js';

// Tool Definitions
export const KinematicsTools = {
    SET_VALUE: {
        name: 'kinematics_set_value',
        description: 'Enter a known quantity on one axis (p0, pf, v0, vf, a, d, t) and derive every quantity reachable from the inputs. Text is read leniently ("12.5m" is 12.5); text without a number clears the quantity.',
        inputSchema: z.object({
            axis: AxisSchema,
            role: RoleSchema,
            value: NumericInputSchema,
            exportFormat: ExportFormatSchema.optional().default('plaintext')
        })
    },
    CLEAR_VALUE: {
        name: 'kinematics_clear_value',
        description: 'Forget a quantity entered on one axis. Values that depended only on it become unknown again.',
        inputSchema: z.object({
            axis: AxisSchema,
            role: RoleSchema,
            exportFormat: ExportFormatSchema.optional().default('plaintext')
        })
    },
    SET_POLAR: {
        name: 'kinematics_set_polar',
        description: 'Enter the launch speed, launch angle (degrees above horizontal) or final speed.',
        inputSchema: z.object({
            quantity: PolarQuantitySchema,
            value: NumericInputSchema,
            exportFormat: ExportFormatSchema.optional().default('plaintext')
        })
    },
    CLEAR_POLAR: {
        name: 'kinematics_clear_polar',
        description: 'Forget the launch speed, launch angle or final speed.',
        inputSchema: z.object({
            quantity: PolarQuantitySchema,
            exportFormat: ExportFormatSchema.optional().default('plaintext')
        })
    },
    RESET: {
        name: 'kinematics_reset',
        description: 'Restore the defaults: launch from the origin, a_x = 0, a_y = -g, everything else unknown.',
        inputSchema: z.object({
            exportFormat: ExportFormatSchema.optional().default('plaintext')
        })
    },
    SNAPSHOT: {
        name: 'kinematics_snapshot',
        description: 'Show every quantity of both axes, the polar quantities, max height, time of flight, range and which rule derived each value.',
        inputSchema: z.object({
            exportFormat: ExportFormatSchema.optional().default('plaintext')
        })
    },
    TRAJECTORY: {
        name: 'kinematics_trajectory',
        description: 'Sample the flight path (t, x, y) from launch to the time of flight, with plot bounds.',
        inputSchema: z.object({
            samples: z.number().int().min(1).max(1000).optional().default(DEFAULT_TRAJECTORY_SAMPLES)
        })
    }
} as const;

export interface KinematicsToolOptions {
    gravity?: number;
    pubsub?: PubSub | null;
}

// One session per live MCP session id; reset drops the entry
const sessions: Map<string, KinematicsSession> = new Map();
let gravity = STANDARD_GRAVITY;
let pubsub: PubSub | null = null;

export function configureKinematicsTools(options: KinematicsToolOptions): void {
    if (options.gravity !== undefined) gravity = options.gravity;
    if (options.pubsub !== undefined) pubsub = options.pubsub;
}

export function resetKinematicsSessions(): void {
    sessions.clear();
}

export function kinematicsSessionCount(): number {
    return sessions.size;
}

function sessionFor(ctx: SessionContext): KinematicsSession {
    let session = sessions.get(ctx.sessionId);
    if (!session) {
        session = new KinematicsSession({ gravity });
        sessions.set(ctx.sessionId, session);
        console.error(`[Kinematics] Created session ${ctx.sessionId} (g = ${gravity})`);
    }
    return session;
}

function recordEdit(ctx: SessionContext, operation: string, target: string | null, snapshot: KinematicsSnapshot): void {
    const event = {
        type: 'kinematics_updated',
        sessionId: ctx.sessionId,
        operation,
        target,
        derived: snapshot.derived
    };

    try {
        new EventLogRepository(getDb()).append('kinematics', event);
    } catch (e) {
        console.error('[Kinematics] Failed to write event log:', e instanceof Error ? e.message : String(e));
    }
    pubsub?.publish('kinematics', event);
}

function respond(snapshot: KinematicsSnapshot, format: ExportFormat, input: string, note?: string): ToolResponse {
    const text = new ExportEngine().export(snapshot, format, input);
    return note ? textResponse(text, note) : textResponse(text);
}

// Handlers

export async function handleSetValue(args: unknown, ctx: SessionContext): Promise<ToolResponse> {
    const parsed = KinematicsTools.SET_VALUE.inputSchema.parse(args);
    const session = sessionFor(ctx);
    const target = `${parsed.axis}.${parsed.role}`;
    const value = parseNumericInput(parsed.value);

    if (value === null) {
        const snapshot = session.clearValue(parsed.axis, parsed.role);
        recordEdit(ctx, 'clear_value', target, snapshot);
        return respond(snapshot, parsed.exportFormat, `clear ${target}`,
            `Note: "${String(parsed.value)}" contains no number; ${target} is now unset.`);
    }

    const snapshot = session.setValue(parsed.axis, parsed.role, value);
    recordEdit(ctx, 'set_value', target, snapshot);
    return respond(snapshot, parsed.exportFormat, `set ${target} = ${formatNumber(value)}`);
}

export async function handleClearValue(args: unknown, ctx: SessionContext): Promise<ToolResponse> {
    const parsed = KinematicsTools.CLEAR_VALUE.inputSchema.parse(args);
    const target = `${parsed.axis}.${parsed.role}`;

    const snapshot = sessionFor(ctx).clearValue(parsed.axis, parsed.role);
    recordEdit(ctx, 'clear_value', target, snapshot);
    return respond(snapshot, parsed.exportFormat, `clear ${target}`);
}

export async function handleSetPolar(args: unknown, ctx: SessionContext): Promise<ToolResponse> {
    const parsed = KinematicsTools.SET_POLAR.inputSchema.parse(args);
    const session = sessionFor(ctx);
    const value = parseNumericInput(parsed.value);

    if (value === null) {
        const snapshot = session.clearPolar(parsed.quantity);
        recordEdit(ctx, 'clear_polar', parsed.quantity, snapshot);
        return respond(snapshot, parsed.exportFormat, `clear ${parsed.quantity}`,
            `Note: "${String(parsed.value)}" contains no number; ${parsed.quantity} is now unset.`);
    }

    const snapshot = session.setPolar(parsed.quantity, value);
    recordEdit(ctx, 'set_polar', parsed.quantity, snapshot);
    return respond(snapshot, parsed.exportFormat, `set ${parsed.quantity} = ${formatNumber(value)}`);
}

export async function handleClearPolar(args: unknown, ctx: SessionContext): Promise<ToolResponse> {
    const parsed = KinematicsTools.CLEAR_POLAR.inputSchema.parse(args);

    const snapshot = sessionFor(ctx).clearPolar(parsed.quantity);
    recordEdit(ctx, 'clear_polar', parsed.quantity, snapshot);
    return respond(snapshot, parsed.exportFormat, `clear ${parsed.quantity}`);
}

export async function handleReset(args: unknown, ctx: SessionContext): Promise<ToolResponse> {
    const parsed = KinematicsTools.RESET.inputSchema.parse(args);

    // A reset session equals a fresh one, so the next call recreates it on demand
    const snapshot = (sessions.get(ctx.sessionId) ?? new KinematicsSession({ gravity })).reset();
    sessions.delete(ctx.sessionId);
    recordEdit(ctx, 'reset', null, snapshot);
    return respond(snapshot, parsed.exportFormat, 'reset');
}

export async function handleSnapshot(args: unknown, ctx: SessionContext): Promise<ToolResponse> {
    const parsed = KinematicsTools.SNAPSHOT.inputSchema.parse(args);
    return respond(sessionFor(ctx).snapshot(), parsed.exportFormat, 'snapshot');
}

export async function handleTrajectory(args: unknown, ctx: SessionContext): Promise<ToolResponse> {
    const parsed = KinematicsTools.TRAJECTORY.inputSchema.parse(args);
    const trajectory = sessionFor(ctx).trajectory(parsed.samples);

    if (trajectory.points.length === 0) {
        return textResponse('Trajectory unavailable: both launch velocities and a positive time of flight must be known.');
    }
    return textResponse(JSON.stringify(trajectory));
}
