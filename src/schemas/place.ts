import { z } from 'zod';

export const PlaceSchema = z.object({
  name: z.string(),
  rating: z.number().finite().nullable(),
  categories: z.array(z.string()).readonly(),
});

export type Place = Readonly<z.infer<typeof PlaceSchema>>;

export function createPlace(input: z.input<typeof PlaceSchema>): Place {
  return Object.freeze(PlaceSchema.parse(input));
}
