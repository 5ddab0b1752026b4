/**
 * User Validation Schemas
 */

import { z } from 'zod';
import { planIdSchema } from './plans.js';

export const telegramIdSchema = z.number().int().positive('Invalid Telegram ID');

export const userProfileSchema = z.object({
    username: z.string().nullable().optional(),
    firstName: z.string().nullable().optional(),
});

export const createUserSchema = userProfileSchema.extend({
    telegramId: telegramIdSchema,
    isAdmin: z.boolean().optional(),
    planId: planIdSchema.nullable().optional(),
    planExpiry: z.date().nullable().optional(),
});

export const updateUserPlanSchema = z.object({
    telegramId: telegramIdSchema,
    planId: planIdSchema.nullable(),
    expiry: z.date().nullable(),
});

export type UserProfileInput = z.infer<typeof userProfileSchema>;
export type CreateUserInput = z.infer<typeof createUserSchema>;
