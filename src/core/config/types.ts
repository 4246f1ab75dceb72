import { z } from 'zod';

export const InputMode = z.enum(['mesh', 'spline']);
export type InputMode = z.infer<typeof InputMode>;

export const ImportStrategyId = z.enum(['import-task', 'asset-subsystem', 'content-browser']);
export type ImportStrategyId = z.infer<typeof ImportStrategyId>;

export const DEFAULT_IMPORT_ORDER: readonly ImportStrategyId[] = ['import-task', 'asset-subsystem', 'content-browser'];

const Dir = z.string().min(1);
const AssetFolder = z
  .string()
  .min(1)
  .refine((s) => s.startsWith('/'), { message: 'asset folders are absolute content paths (e.g. /Game/...)' })
  .transform((s) => s.replace(/\/+$/, ''));

export const EngineJobConfig = z.object({
  /** Graph/definition file the engine loads (a .hip scene). */
  graphFile: z.string().min(1),
  /** Node path of the network to cook inside the graph file. */
  topnet: z.string().min(1).default('/obj/geo1/topnet')
});
export type EngineJobConfig = z.infer<typeof EngineJobConfig>;

export const ShuttleConfig = z.object({
  stateDir: Dir.default('.shuttle'),

  editor: z
    .object({
      bridgeUrl: z.string().url().default('http://127.0.0.1:30020'),
      requestTimeoutMs: z.number().int().positive().default(120_000)
    })
    .default({}),

  storage: z
    .object({
      splines: Dir.default('Dependencies/PCG_HD/In/GZ/Splines'),
      meshSets: Dir.default('Dependencies/PCG_HD/In/GZ/Mod'),
      tables: Dir.default('Dependencies/PCG_HD/Out/CSV'),
      geometry: Dir.default('Dependencies/SW_Roads/Out/Mod')
    })
    .default({}),

  assets: z
    .object({
      tables: AssetFolder.default('/Game/Pipeline/PCG_HD/CSV'),
      sidewalks: AssetFolder.default('/Game/Pipeline/Assets/Sidewalks'),
      roads: AssetFolder.default('/Game/Pipeline/Assets/Road'),
      pcgGraphs: AssetFolder.default('/Game/Pipeline/PCG_HD/BP/BP_PCG_HD_inst'),
      pcgTemplate: z.string().min(1).default('/Game/Pipeline/PCG_HD/BP/BP_PCG_HD_TEMPLATE')
    })
    .default({}),

  level: z
    .object({
      splineActorPrefix: z.string().min(1).default('BP_CityKit_spline'),
      genzoneMarker: z.string().min(1).default('genzone'),
      sidewalksFolder: z.string().min(1).default('Sidewalks'),
      roadsFolder: z.string().min(1).default('Roads')
    })
    .default({}),

  engine: z
    .object({
      executable: z.string().min(1).default('hython'),
      /** Driver script passed as the first argument (the engine-side entry point). */
      driverScript: z.string().min(1).optional(),
      timeoutMs: z.number().int().positive().default(1_800_000),
      jobs: z
        .object({
          buildings: EngineJobConfig.default({ graphFile: 'genbuildingbase.hip' }),
          roads: EngineJobConfig.default({ graphFile: 'sidewalks.hip' })
        })
        .default({})
    })
    .default({}),

  import: z
    .object({
      strategies: z.array(ImportStrategyId).min(1).default([...DEFAULT_IMPORT_ORDER])
    })
    .default({}),

  run: z
    .object({
      inputMode: InputMode.default('mesh'),
      continueOnOptionalFailure: z.boolean().default(false)
    })
    .default({})
});

export type ShuttleConfig = z.infer<typeof ShuttleConfig>;
export type ShuttleConfigInput = z.input<typeof ShuttleConfig>;
