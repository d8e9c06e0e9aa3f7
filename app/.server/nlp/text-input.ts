import { z } from 'zod';
import type { TextInput } from '~/types/analysis';

// Empty text is valid and is forwarded to the model as-is
export const TextInputSchema: z.ZodType<TextInput> = z.object({
  text: z.string(),
});
