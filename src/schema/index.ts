import { z } from 'zod';
import { parseIsoDate } from '../calendar/date.js';

export const COLORS = ['blue', 'green', 'red', 'yellow', 'magenta', 'cyan', 'white'] as const;

export const ColorSchema = z.enum(COLORS);
export type Color = z.infer<typeof ColorSchema>;

export const IsoDateSchema = z
  .string()
  .refine((value) => parseIsoDate(value) !== null, { message: 'Expected a real date in YYYY-MM-DD format' });

const IdSchema = z.number().int().positive();

export const SubcalendarSchema = z.object({
  id: IdSchema,
  name: z.string(),
  color: ColorSchema,
  visible: z.boolean(),
});
export type Subcalendar = z.infer<typeof SubcalendarSchema>;

export const TaskRecordSchema = z.object({
  id: IdSchema,
  subcalendar_id: IdSchema,
  date: IsoDateSchema,
  title: z.string().refine((value) => value.trim().length > 0, { message: 'Task title cannot be empty' }),
  completed: z.boolean(),
});
export type TaskRecord = z.infer<typeof TaskRecordSchema>;

export const NextIdsSchema = z.object({
  subcalendar: IdSchema,
  task: IdSchema,
});
export type NextIds = z.infer<typeof NextIdsSchema>;

/**
 * On-disk shape of the calendar store. `version` and `nextIds` are optional on
 * read so hand-written files with only `subcalendars`/`tasks` still load.
 */
export const StoreFileSchema = z.object({
  version: z.literal(1).optional(),
  nextIds: NextIdsSchema.optional(),
  subcalendars: z.array(SubcalendarSchema),
  tasks: z.array(TaskRecordSchema),
});
export type StoreFile = z.infer<typeof StoreFileSchema>;

export interface StoreDocument {
  version: 1;
  nextIds: NextIds;
  subcalendars: Subcalendar[];
  tasks: TaskRecord[];
}
