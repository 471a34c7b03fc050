/**
 * Polygon soup schemas
 *
 * Zod schemas for soup arriving from outside the program (parsed JSON,
 * messages). `parsePolygonSoup` only checks shape and number types; topology
 * problems such as non-manifold edges are left to `buildMesh`.
 */

import { z } from 'zod';
import type { Vec3 } from '../num/vec3.js';
import type { PolygonSoup } from '../topo/types.js';
import { type MeshResult, success, fail } from '../topo/errors.js';

export const vec3Schema = z.tuple([z.number(), z.number(), z.number()]);

export const faceIndicesSchema = z.array(z.number().int().nonnegative());

export const polygonSoupSchema = z.object({
  positions: z.array(vec3Schema),
  faces: z.array(faceIndicesSchema),
});

export type PolygonSoupInput = z.input<typeof polygonSoupSchema>;

/**
 * Validate untrusted input as `[x, y, z]` polygon soup
 *
 * ```ts
 * const soup = unwrapResult(parsePolygonSoup(JSON.parse(text)));
 * const mesh = unwrapResult(buildMesh(soup.positions, soup.faces));
 * ```
 */
export function parsePolygonSoup(input: unknown): MeshResult<PolygonSoup<Vec3>> {
  const parsed = polygonSoupSchema.safeParse(input);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first && first.path.length > 0 ? ` at ${first.path.map(String).join('.')}` : '';
    return fail('InvalidSoup', `Invalid polygon soup${where}: ${first?.message ?? 'unknown error'}`, 'parse', {
      issues: parsed.error.issues.map((issue) => ({ path: issue.path.map(String), message: issue.message })),
    });
  }
  return success(parsed.data);
}
