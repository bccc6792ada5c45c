import { z } from 'zod';

export const idParams = z.object({ id: z.string().uuid() });

export const scanUploadQuery = z.object({
  shopId: z.string().uuid(),
  userId: z.string().uuid().optional(),
});

export const createShopBody = z.object({
  name: z.string().trim().min(1).max(200),
  location: z.string().trim().max(500).nullish(),
});

export const createUserBody = z.object({
  email: z.string().trim().toLowerCase().email(),
  name: z.string().trim().min(1).max(200).nullish(),
});

export const alertListQuery = z.object({
  unacknowledged: z.enum(['true', 'false']).optional(),
});
