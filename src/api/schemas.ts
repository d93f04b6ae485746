import { z } from 'zod';

export const listedUnitSchema = z.object({
  unit: z.string(),
  load: z.string(),
  active: z.string(),
  sub: z.string(),
  description: z.string(),
});

export const listUnitsSchema = z.array(listedUnitSchema);

export const timerEntrySchema = z.object({
  unit: z.string(),
  // microseconds since the epoch, 0 or null when nothing is scheduled
  next: z.number().nullable().optional(),
});

export const socketEntrySchema = z.object({
  unit: z.string(),
  listen: z.string(),
});

export const unitFileEntrySchema = z.object({
  unit_file: z.string(),
  state: z.string(),
});

export const journalObjectSchema = z.record(z.unknown());

export type ListedUnit = z.infer<typeof listedUnitSchema>;
export type TimerEntry = z.infer<typeof timerEntrySchema>;
export type SocketEntry = z.infer<typeof socketEntrySchema>;
export type UnitFileEntry = z.infer<typeof unitFileEntrySchema>;
