import { z } from 'zod';

export const AddBookSchema = z.object({
    title: z.string().trim().min(1, 'title is required'),
    author: z.string().trim().min(1, 'author is required'),
    totalCopies: z.number().int('totalCopies must be a whole number').min(1, 'totalCopies must be at least 1').default(1),
});

export type AddBookDto = z.input<typeof AddBookSchema>;
