import { z } from 'zod';

export const AdminHeadersSchema = z.object({
    'x-admin-token': z.string().min(1, 'Admin token is required').max(200, 'Admin token too long'),
});
