import { z } from 'zod';

import { diagnosisSchema } from './diagnosis.js';

// ── ScriptArtifact ───────────────────────────────────────────

export const scriptArtifactSchema = z.object({
  version: z.number().int().positive(),
  code: z.string().min(1),
  model: z.string().min(1),
  cost: z.number().nonnegative(),
  diagnosis: diagnosisSchema.optional(),
});

export type ScriptArtifact = z.infer<typeof scriptArtifactSchema>;
