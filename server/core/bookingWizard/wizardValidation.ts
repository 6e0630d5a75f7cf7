import { z } from 'zod';
import { getActiveService, getActiveProductsByIds } from '../catalogService';
import { firstZodIssue, validationError, type SlotConflictError, type ValidationError } from '../errors';
import type { DbExecutor } from '../../db';
import { checkSlotRules } from './slotRules';
import { findSlotConflict } from './conflictDetection';
import type { SelectedService, SelectedProduct, SelectedSchedule } from './types';

export const serviceStepSchema = z.object({
  serviceId: z.coerce.number().int().positive(),
});

export const productsStepSchema = z.object({
  products: z.array(z.object({
    productId: z.coerce.number().int().positive(),
    quantity: z.coerce.number().int().min(1).max(10).default(1),
  })).max(20).default([]),
});

export const scheduleStepSchema = z.object({
  scheduledDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be YYYY-MM-DD'),
  scheduledTime: z.string().regex(/^\d{2}:\d{2}$/, 'Time must be HH:MM'),
  specialInstructions: z.string().trim().max(500).optional(),
});

export async function validateServiceStep(
  fields: unknown,
  executor?: DbExecutor
): Promise<SelectedService | ValidationError> {
  const parsed = serviceStepSchema.safeParse(fields);
  if (!parsed.success) return firstZodIssue(parsed.error, 'serviceId');

  const service = await getActiveService(parsed.data.serviceId, executor);
  if (!service) {
    return validationError('serviceId', 'Selected service is not available');
  }
  return {
    serviceId: service.id,
    name: service.name,
    priceCents: service.priceCents,
    durationMinutes: service.durationMinutes,
  };
}

export async function validateProductsStep(
  fields: unknown,
  executor?: DbExecutor
): Promise<SelectedProduct[] | ValidationError> {
  const parsed = productsStepSchema.safeParse(fields ?? {});
  if (!parsed.success) return firstZodIssue(parsed.error, 'products');

  const requested = parsed.data.products;
  const ids = requested.map(p => p.productId);
  if (new Set(ids).size !== ids.length) {
    return validationError('products', 'Each product may only be listed once');
  }

  const catalog = await getActiveProductsByIds(ids, executor);
  const selected: SelectedProduct[] = [];
  for (const [index, item] of requested.entries()) {
    const product = catalog.get(item.productId);
    if (!product) {
      return validationError(`products.${index}.productId`, `Product ${item.productId} is not available`);
    }
    selected.push({
      productId: product.id,
      name: product.name,
      unitPriceCents: product.priceCents,
      quantity: item.quantity,
    });
  }
  return selected;
}

export async function validateScheduleStep(
  fields: unknown,
  service: SelectedService,
  now: Date,
  executor?: DbExecutor
): Promise<SelectedSchedule | ValidationError | SlotConflictError> {
  const parsed = scheduleStepSchema.safeParse(fields);
  if (!parsed.success) return firstZodIssue(parsed.error, 'scheduledDate');

  const { scheduledDate, scheduledTime, specialInstructions } = parsed.data;
  const rules = checkSlotRules({ scheduledDate, scheduledTime, durationMinutes: service.durationMinutes }, now);
  if ('code' in rules) return rules;

  const conflict = await findSlotConflict(service.serviceId, rules.scheduledAt, service.durationMinutes, executor);
  if (conflict) {
    return {
      code: 'SLOT_CONFLICT',
      message: 'That time slot is already booked. Please pick another time.',
      conflictingBookingId: conflict.bookingId,
    };
  }

  return {
    scheduledDate,
    scheduledTime,
    specialInstructions: specialInstructions ? specialInstructions : null,
  };
}
