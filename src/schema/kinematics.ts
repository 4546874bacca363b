import { z } from 'zod';

/**
 * Kinematic roles of one axis, in display order.
 * p0/pf: initial/final position, v0/vf: initial/final velocity,
 * a: acceleration, d: displacement, t: elapsed time.
 */
export const ROLES = ['p0', 'pf', 'v0', 'vf', 'a', 'd', 't'] as const;

export const RoleSchema = z.enum(ROLES);
export type Role = z.infer<typeof RoleSchema>;

export const AXES = ['x', 'y'] as const;

export const AxisSchema = z.enum(AXES);
export type Axis = z.infer<typeof AxisSchema>;

export const PolarQuantitySchema = z.enum(['launchSpeed', 'launchAngle', 'finalSpeed']);
export type PolarQuantity = z.infer<typeof PolarQuantitySchema>;

export const VariableSchema = z.object({
    value: z.number(),
    known: z.boolean(),
    userSet: z.boolean()
}).refine(v => !v.userSet || v.known, {
    message: 'A user-set quantity must be known'
});

export type Variable = z.infer<typeof VariableSchema>;

export const AxisStateSchema = z.object({
    p0: VariableSchema,
    pf: VariableSchema,
    v0: VariableSchema,
    vf: VariableSchema,
    a: VariableSchema,
    d: VariableSchema,
    t: VariableSchema
});

export type AxisState = z.infer<typeof AxisStateSchema>;

export const LaunchVectorSchema = z.object({
    speed: VariableSchema,
    angle: VariableSchema.describe('Degrees above the horizontal')
});

export type LaunchVector = z.infer<typeof LaunchVectorSchema>;

export const FinalVelocityMagnitudeSchema = z.object({
    speed: VariableSchema
});

export type FinalVelocityMagnitude = z.infer<typeof FinalVelocityMagnitudeSchema>;

/**
 * Where a derived value came from: a numbered rule of the axis solver,
 * or one of the coordinator's cross-axis steps.
 */
export const DerivationSchema = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('rule'), rule: z.number().int().min(1), equation: z.string() }),
    z.object({ kind: z.literal('launch-vector') }),
    z.object({ kind: z.literal('final-speed') }),
    z.object({ kind: z.literal('shared-time'), from: AxisSchema }),
    z.object({ kind: z.literal('components') })
]);

export type Derivation = z.infer<typeof DerivationSchema>;

export const AxisAttributionSchema = z.record(RoleSchema, DerivationSchema);
export type AxisAttribution = Partial<Record<Role, Derivation>>;

export const PolarAttributionSchema = z.record(PolarQuantitySchema, DerivationSchema);
export type PolarAttribution = Partial<Record<PolarQuantity, Derivation>>;

export const DerivedQuantitiesSchema = z.object({
    maxHeight: z.number().nullable(),
    timeOfFlight: z.number().nullable(),
    range: z.number().nullable()
});

export type DerivedQuantities = z.infer<typeof DerivedQuantitiesSchema>;

export const KinematicsSnapshotSchema = z.object({
    x: AxisStateSchema,
    y: AxisStateSchema,
    launch: LaunchVectorSchema,
    final: FinalVelocityMagnitudeSchema,
    attribution: z.object({
        x: AxisAttributionSchema,
        y: AxisAttributionSchema,
        polar: PolarAttributionSchema
    }),
    derived: DerivedQuantitiesSchema
});

export type KinematicsSnapshot = z.infer<typeof KinematicsSnapshotSchema>;

export const TrajectoryPointSchema = z.object({
    t: z.number(),
    x: z.number(),
    y: z.number()
});

export type TrajectoryPoint = z.infer<typeof TrajectoryPointSchema>;

export const TrajectoryBoundsSchema = z.object({
    minX: z.number(),
    maxX: z.number(),
    minY: z.number(),
    maxY: z.number()
});

export type TrajectoryBounds = z.infer<typeof TrajectoryBoundsSchema>;

// Raw numeric input: a number, or text coerced leniently (see engine/kinematics/input)
export const NumericInputSchema = z.union([z.number(), z.string()]);
export type NumericInput = z.infer<typeof NumericInputSchema>;
