import { writeJson } from '../../utils/fs.js';
import { ZERO_TRANSFORM } from '../editor/types.js';
import { SplineDescription, toSplineRecords, type SplineRecord } from '../payloads/splines.js';
import { joinWarnings, type StepDefinition } from './types.js';

export const exportSplines: StepDefinition = {
  id: 'export-splines',
  name: 'Export splines',
  kind: 'in-session',
  optional: true,
  inputs: () => ['spline-actors'],
  outputs: () => ['spline-description'],

  async execute(ctx) {
    const actors = await ctx.resolver.discover('spline-actors', ctx.iteration);
    const records: SplineRecord[] = [];
    const warnings: string[] = [];

    for (const found of actors) {
      const actor = found.actor;
      if (!actor) continue;
      const components = await ctx.session.getSplineComponents(actor.path);
      if (!components.length) {
        warnings.push(`${actor.label} has no spline components`);
        continue;
      }
      const location = actor.transform?.location ?? ZERO_TRANSFORM.location;
      records.push(...toSplineRecords({ label: actor.label, location }, components));
    }

    if (!records.length) {
      return { status: 'failed', diagnostic: joinWarnings(`none of ${actors.length} spline actor(s) carry spline components`, warnings) };
    }

    const target = ctx.resolver.resolve('spline-description', ctx.iteration);
    await writeJson(target, SplineDescription.parse(records));
    ctx.logger.debug('splines exported', { target, records: records.length });

    const base = `exported ${records.length} spline(s) from ${actors.length} actor(s) to ${target}`;
    return { status: warnings.length ? 'warned' : 'succeeded', diagnostic: joinWarnings(base, warnings) };
  }
};
