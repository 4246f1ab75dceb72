import type { InputMode } from '../../core/config/types.js';
import type { ArtifactCategory } from '../../core/naming/categories.js';
import { stepsForVariant } from '../../core/steps/registry.js';
import type { StepId, StepKind } from '../../core/steps/types.js';
import type { WorkflowVariant } from '../../core/workflow/variants.js';
import { getRenderer } from '../ui/renderer.js';
import { padRight } from '../ui/format.js';
import { theme, INDENT, STEP_LABEL_WIDTH } from '../ui/theme.js';

export interface StepListing {
  ordinal: number;
  id: StepId;
  name: string;
  kind: StepKind;
  optional: boolean;
  inputs: ArtifactCategory[];
  outputs: ArtifactCategory[];
}

/**
 * `shuttle steps` — the step sequence of a variant with its inputs and outputs.
 */
export function runStepsCommand(opts: { variant?: WorkflowVariant; inputMode?: InputMode } = {}): { ok: true; steps: StepListing[] } {
  const r = getRenderer();
  const variant = opts.variant ?? 'full';
  const mode = opts.inputMode ?? 'mesh';

  const steps = stepsForVariant(variant).map((s, i) => ({
    ordinal: i + 1,
    id: s.id,
    name: s.name,
    kind: s.kind,
    optional: s.optional,
    inputs: [...s.inputs(mode)],
    outputs: [...s.outputs(mode)]
  }));

  r.text(`${INDENT}${theme.bold(`Variant ${variant}`)} ${theme.dim(`(input mode ${mode})`)}`);
  r.blank();
  for (const s of steps) {
    const label = padRight(`${s.ordinal}. ${s.id}`, STEP_LABEL_WIDTH + 4);
    const flags = [theme.kind(s.kind)(s.kind), s.optional ? theme.dim('optional') : ''].filter(Boolean).join(' ');
    r.text(`${INDENT}${theme.bold(label)} ${flags}`);
    r.text(`${INDENT}   ${theme.dim('in ')} ${s.inputs.join(', ') || theme.dim('(none)')}`);
    r.text(`${INDENT}   ${theme.dim('out')} ${s.outputs.join(', ')}`);
  }
  r.blank();
  return { ok: true, steps };
}
