/**
 * Mesh configuration
 */

import { z } from 'zod';
import { type NumericContext, type Tolerances, createNumericContext } from '../num/tolerance.js';

export type LogLevel = `silent` | `warn` | `debug`;

export interface MeshConfig {
  /** Tolerances used by geometric queries */
  ctx: NumericContext;
  /** Upper bound on half-edges visited by one face walk before it is declared corrupt */
  maxFaceDegree: number;
  /** Upper bound on half-edges visited by one vertex rotation */
  maxVertexValence: number;
  /** Whether `splitEdge` accepts edges on the open boundary */
  allowBoundarySplit: boolean;
  logLevel: LogLevel;
}

export interface MeshConfigInput extends Partial<Omit<MeshConfig, `ctx`>> {
  tolerances?: Partial<Tolerances>;
}

export const DEFAULT_WALK_BOUND = 1 << 16;

/**
 * Create a complete configuration from partial overrides
 */
export function createMeshConfig(input: MeshConfigInput = {}): MeshConfig {
  return {
    ctx: createNumericContext(input.tolerances),
    maxFaceDegree: input.maxFaceDegree ?? DEFAULT_WALK_BOUND,
    maxVertexValence: input.maxVertexValence ?? DEFAULT_WALK_BOUND,
    allowBoundarySplit: input.allowBoundarySplit ?? true,
    logLevel: input.logLevel ?? `silent`,
  };
}

/**
 * Schema for configuration read from outside the program (a JSON file,
 * command-line flags). Every field is optional.
 */
export const meshConfigInputSchema = z.object({
  tolerances: z
    .object({
      length: z.number().positive(),
      angle: z.number().positive(),
    })
    .partial()
    .optional(),
  maxFaceDegree: z.number().int().min(3).optional(),
  maxVertexValence: z.number().int().min(1).optional(),
  allowBoundarySplit: z.boolean().optional(),
  logLevel: z.enum([`silent`, `warn`, `debug`]).optional(),
});

/**
 * Validate untrusted configuration and fill in defaults
 *
 * @throws ZodError if the input does not match `meshConfigInputSchema`
 */
export function parseMeshConfig(input: unknown): MeshConfig {
  return createMeshConfig(meshConfigInputSchema.parse(input));
}
