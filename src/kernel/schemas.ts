import { z } from 'zod';
import { OPERATION_ROLES } from './operations.js';
import { MOVE_VALIDATION_MODES } from './validation-options.js';

export const StringSchema = z.string();
export const NonEmptyStringSchema = z.string().min(1);

export const LocusSchema = z.array(NonEmptyStringSchema);

export const GateImplementationDefSchema = z
  .object({
    loci: z.array(LocusSchema),
  })
  .strict();

export const DefaultImplementationOverrideDefSchema = z
  .object({
    locus: LocusSchema,
    implementation: NonEmptyStringSchema,
  })
  .strict();

export const GateInfoDefSchema = z
  .object({
    implementations: z.record(StringSchema, GateImplementationDefSchema),
    defaultImplementation: NonEmptyStringSchema,
    overrideDefaultImplementation: z.array(DefaultImplementationOverrideDefSchema).optional(),
  })
  .strict();

export const DynamicArchitectureDefSchema = z
  .object({
    calibrationSetId: StringSchema,
    qubits: z.array(NonEmptyStringSchema),
    computationalResonators: z.array(NonEmptyStringSchema),
    gates: z.record(StringSchema, GateInfoDefSchema),
  })
  .strict();

export const InstructionSchema = z
  .object({
    name: NonEmptyStringSchema,
    qubits: LocusSchema,
    args: z.record(StringSchema, z.unknown()).default({}),
    implementation: StringSchema.nullable().optional(),
  })
  .strict();

export const CircuitSchema = z
  .object({
    name: StringSchema,
    instructions: z.array(InstructionSchema),
    metadata: z.record(StringSchema, z.unknown()).optional(),
  })
  .strict();

export const QubitMappingSchema = z.record(NonEmptyStringSchema, NonEmptyStringSchema);

export const ValidationOptionsInputSchema = z
  .object({
    moveValidation: z.enum(MOVE_VALIDATION_MODES).optional(),
    mustCloseSandwiches: z.boolean().optional(),
    sandwichAllowedRoles: z.array(z.enum(OPERATION_ROLES)).optional(),
    checkStructure: z.boolean().optional(),
    trace: z.boolean().optional(),
  })
  .strict();

export const ValidationRequestSchema = z
  .object({
    architecture: DynamicArchitectureDefSchema,
    circuits: z.array(CircuitSchema),
    qubitMapping: QubitMappingSchema.nullable().optional(),
    options: ValidationOptionsInputSchema.optional(),
  })
  .strict();

export type ValidationRequest = z.infer<typeof ValidationRequestSchema>;
