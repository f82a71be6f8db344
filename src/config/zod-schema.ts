import { z } from "zod";

const NameSchema = z.string().trim().min(1);

export const LevelsConfigSchema = z.union([
  z.array(NameSchema),
  z.object({ upTo: NameSchema }).strict(),
]);

export const SourceFilterConfigSchema = z
  .object({
    mode: z.union([z.literal("blacklist"), z.literal("whitelist")]),
    sources: z.array(NameSchema).optional(),
  })
  .strict();

export const FormatterConfigSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("basic") }).strict(),
  z.object({ type: z.literal("ansi") }).strict(),
  z.object({ type: z.literal("time"), subsecond: z.boolean().optional() }).strict(),
  z.object({ type: z.literal("relative-time"), subsecond: z.boolean().optional() }).strict(),
  z.object({ type: z.literal("pattern-time"), pattern: z.string().min(1) }).strict(),
]);

const backendCommon = {
  levels: LevelsConfigSchema.optional(),
  sourceFilter: SourceFilterConfigSchema.optional(),
  formatter: FormatterConfigSchema.optional(),
  styled: z.boolean().optional(),
};

export const ConsoleBackendConfigSchema = z
  .object({
    type: z.literal("console"),
    stream: z.union([z.literal("stdout"), z.literal("stderr")]).optional(),
    ...backendCommon,
  })
  .strict();

export const FileBackendConfigSchema = z
  .object({
    type: z.literal("file"),
    path: z.string().min(1),
    ...backendCommon,
  })
  .strict();

export const BackendConfigSchema = z.discriminatedUnion("type", [
  ConsoleBackendConfigSchema,
  FileBackendConfigSchema,
]);

export const LoggingConfigSchema = z
  .object({
    backends: z.array(BackendConfigSchema).optional(),
  })
  .strict();
