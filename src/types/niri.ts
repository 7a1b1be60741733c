/**
 * Shapes of the documents returned by `niri msg --json <message>`.
 *
 * Only the fields this tool reads are required. Everything else niri documents
 * is optional, and unknown fields pass through untouched.
 */

import { z } from 'zod';

export const NiriWorkspaceSchema = z
  .object({
    id: z.number().optional(),
    idx: z.number().optional(),
    name: z.string().nullish(),
    output: z.string().nullish(),
    is_active: z.boolean().optional(),
    is_focused: z.boolean(),
    active_window_id: z.number().nullish(),
  })
  .passthrough();
export type NiriWorkspace = z.infer<typeof NiriWorkspaceSchema>;

export const NiriWorkspacesSchema = z.array(NiriWorkspaceSchema);

export const NiriLogicalOutputSchema = z
  .object({
    x: z.number().optional(),
    y: z.number().optional(),
    width: z.number().optional(),
    height: z.number().optional(),
    scale: z.number(),
    transform: z.string().optional(),
  })
  .passthrough();
export type NiriLogicalOutput = z.infer<typeof NiriLogicalOutputSchema>;

export const NiriModeSchema = z
  .object({
    width: z.number().optional(),
    height: z.number().optional(),
    refresh_rate: z.number().optional(),
    is_preferred: z.boolean().optional(),
  })
  .passthrough();
export type NiriMode = z.infer<typeof NiriModeSchema>;

export const NiriOutputSchema = z
  .object({
    name: z.string(),
    make: z.string().nullish(),
    model: z.string().nullish(),
    serial: z.string().nullish(),
    physical_size: z.tuple([z.number(), z.number()]).nullish(),
    modes: z.array(NiriModeSchema).optional(),
    current_mode: z.number().nullish(),
    vrr_supported: z.boolean().optional(),
    vrr_enabled: z.boolean().optional(),
    // null while the output is disabled
    logical: NiriLogicalOutputSchema.nullable(),
  })
  .passthrough();
export type NiriOutput = z.infer<typeof NiriOutputSchema>;

export const NiriOutputsSchema = z.record(z.string(), NiriOutputSchema);
export type NiriOutputs = z.infer<typeof NiriOutputsSchema>;

export type NiriMessage = 'workspaces' | 'outputs';
