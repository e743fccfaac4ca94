import { z } from "zod";

/* ============================== Zod Schemas ============================== */

export const StructureLevelSchema = z.union([z.literal(1), z.literal(2), z.literal(3)]);

// Codes are not unique: the same code may be registered once per structure level.
export const ProjectSchema = z.object({
  id: z.number().int(),
  code: z.string().min(1),
  description: z.string().default(""),
  isBillable: z.boolean().default(false),
  isActive: z.boolean().default(true),
  position: z.string().optional(),
  structureLevel: StructureLevelSchema.default(1),
});

export const PhaseSchema = z.object({
  id: z.number().int(),
  projectId: z.number().int(),
  code: z.string().min(1),
  description: z.string().optional(),
});

// Tasks without a phaseId hang directly off the project (older layout).
export const TaskSchema = z.object({
  id: z.number().int(),
  projectId: z.number().int(),
  phaseId: z.number().int().optional(),
  code: z.string().min(1),
  description: z.string().optional(),
});

export const NormSchema = z.object({
  year: z.number().int().min(2000),
  month: z.number().int().min(1).max(12),
  hours: z.number().positive().max(248),
});

export const BillableTargetTypeSchema = z.enum(["days", "percent"]);

export const SettingsSchema = z.object({
  workCalendar: z.string().min(1).default("primary"),
  billableTargetType: BillableTargetTypeSchema.default("percent"),
  billableTargetValue: z.number().nonnegative().default(75),
  baseLocation: z.string().default(""),
});

export const CatalogDataSchema = z.object({
  projects: z.array(ProjectSchema).default([]),
  phases: z.array(PhaseSchema).default([]),
  tasks: z.array(TaskSchema).default([]),
  exclusions: z.array(z.string()).default([]),
  norms: z.array(NormSchema).default([]),
  settings: SettingsSchema.default({}),
});

/* ============================== Types =================================== */

export type StructureLevel = z.infer<typeof StructureLevelSchema>;
export type Project = z.infer<typeof ProjectSchema>;
export type Phase = z.infer<typeof PhaseSchema>;
export type Task = z.infer<typeof TaskSchema>;
export type Norm = z.infer<typeof NormSchema>;
export type BillableTargetType = z.infer<typeof BillableTargetTypeSchema>;
export type Settings = z.infer<typeof SettingsSchema>;
export type CatalogData = z.infer<typeof CatalogDataSchema>;
export type CatalogInput = z.input<typeof CatalogDataSchema>;
