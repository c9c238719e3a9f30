import { z } from 'zod';

export const AddMemberSchema = z.object({
    name: z.string().trim().min(1, 'name is required'),
    contact: z.string().trim().min(1, 'contact is required'),
});

export type AddMemberDto = z.input<typeof AddMemberSchema>;
