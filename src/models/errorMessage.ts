import { z } from 'zod';

/** JSON body the API sends with non-2xx responses. */
export const ErrorMessageSchema = z.object({
  message: z.string().nullish(),
});

export type ErrorMessage = z.output<typeof ErrorMessageSchema>;
