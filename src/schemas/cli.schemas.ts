import { z } from 'zod';

export const cliOptionsSchema = z.object({
  input: z.string({ required_error: 'An input file is required (-i <INPUT FILE>)' })
    .min(1, 'An input file is required (-i <INPUT FILE>)'),
  output: z.string().min(1, 'Output path must not be empty').optional(),
  verbose: z.coerce.number()
    .int('Verbosity must be a whole number')
    .min(0, 'Verbosity must be between 0 and 5')
    .max(5, 'Verbosity must be between 0 and 5')
    .default(3),
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;
