/**
 * Plan Validation Schemas
 */

import { z } from 'zod';

export const planIdSchema = z.number().int().positive('Invalid plan ID');

// Column-level checks only; pricing and limit policy belong to whoever
// manages the catalog
export const createPlanSchema = z.object({
    name: z.string().trim().min(1, 'Plan name is required'),
    price: z.number().finite().default(0),
    maxAccounts: z.number().int().default(1),
    description: z.string().nullable().optional(),
    durationDays: z.number().int().default(30),
});

export type CreatePlanInput = z.input<typeof createPlanSchema>;
