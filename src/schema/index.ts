import { z } from 'zod';

/**
 * An iCalendar content line the tool carries through untouched
 * (DESCRIPTION, PRIORITY, CATEGORIES, X-* ...).
 */
export const IcalPropertySchema = z.object({
  name: z.string(),
  params: z.string(),
  value: z.string(),
});
export type IcalProperty = z.infer<typeof IcalPropertySchema>;

export const TodoSchema = z.object({
  uid: z.string(),
  /** Null until the record is first saved into a list. */
  filename: z.string().nullable(),
  summary: z.string(),
  due: z.date().nullable(),
  /** STATUS as written in the file (NEEDS-ACTION, IN-PROCESS, CANCELLED ...); null when absent. */
  status: z.string().nullable(),
  completed: z.boolean(),
  completedAt: z.date().nullable(),
  extra: z.array(IcalPropertySchema),
});
export type Todo = z.infer<typeof TodoSchema>;

export const IdIndexRowSchema = z.object({
  id: z.number().int().positive(),
  list: z.string(),
  filename: z.string(),
});
export type IdIndexRow = z.infer<typeof IdIndexRowSchema>;

export const IdIndexSchema = z.object({
  version: z.literal(1),
  generatedAt: z.string(),
  rows: z.array(IdIndexRowSchema),
});
export type IdIndex = z.infer<typeof IdIndexSchema>;
