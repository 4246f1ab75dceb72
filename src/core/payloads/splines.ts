import { z } from 'zod';

import { Rotator, Vector3, type SplineComponentData } from '../editor/types.js';

export const SplinePointRecord = z
  .object({
    index: z.number().int().nonnegative(),
    location: Vector3,
    tangent: Vector3,
    rotation: Rotator,
    scale: Vector3,
    point_type: z.string()
  })
  .passthrough();
export type SplinePointRecord = z.infer<typeof SplinePointRecord>;

export const SplineRecord = z
  .object({
    actor_name: z.string(),
    actor_location: Vector3,
    component_name: z.string(),
    component_index: z.number().int().nonnegative(),
    points: z.array(SplinePointRecord)
  })
  .passthrough();
export type SplineRecord = z.infer<typeof SplineRecord>;

export const SplineDescription = z.array(SplineRecord);
export type SplineDescription = z.infer<typeof SplineDescription>;

export function toSplineRecords(
  actor: { label: string; location: Vector3 },
  components: readonly SplineComponentData[]
): SplineRecord[] {
  return components.map((c, componentIndex) => ({
    actor_name: actor.label,
    actor_location: actor.location,
    component_name: c.name,
    component_index: componentIndex,
    points: c.points.map((p, index) => ({
      index,
      location: p.location,
      tangent: p.tangent,
      rotation: p.rotation,
      scale: p.scale,
      point_type: p.pointType
    }))
  }));
}

export const GenzoneTransforms = z.object({
  actors: z.array(
    z
      .object({
        name: z.string(),
        mesh: z.string().nullable(),
        location: Vector3,
        rotation: Rotator,
        scale: Vector3
      })
      .passthrough()
  )
});
export type GenzoneTransforms = z.infer<typeof GenzoneTransforms>;
