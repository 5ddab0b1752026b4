/**
 * Linked Account Validation Schemas
 */

import { z } from 'zod';
import { telegramIdSchema } from './users.js';

export const accountIdSchema = z.number().int().positive('Invalid account ID');

// International format: optional leading + followed by digits only
export const phoneNumberSchema = z
    .string()
    .trim()
    .regex(/^\+?\d{4,15}$/, 'Invalid phone number');

export const accountSessionSchema = z.object({
    deviceId: z.string().nullable().optional(),
    cookie: z.string().nullable().optional(),
    accessToken: z.string().nullable().optional(),
    refreshToken: z.string().nullable().optional(),
});

export const createAccountSchema = accountSessionSchema.extend({
    userId: telegramIdSchema,
    phoneNumber: phoneNumberSchema,
});

export const balanceSchema = z.number().finite();

export type AccountSessionInput = z.infer<typeof accountSessionSchema>;
export type CreateAccountInput = z.infer<typeof createAccountSchema>;
