import { z } from 'zod';
import rawCategories from '../data/occurrenceCategories.json';

const categorySchema = z.object({
  code: z.string().regex(/^[A-Z]+(-[A-Z]+)?$/),
  name: z.string().min(1),
  description: z.string().min(1)
});

export type OccurrenceCategory = z.infer<typeof categorySchema>;

const categories: readonly OccurrenceCategory[] = Object.freeze(z.array(categorySchema).parse(rawCategories));

/** ICAO occurrence categories offered to human evaluators, sorted by code. */
export function listOccurrenceCategories(): readonly OccurrenceCategory[] {
  return categories;
}
