/**
 * Zod schemas for validating caller inputs
 */

import { z } from 'zod';

/** Namespace name */
export const namespaceNameSchema = z
  .string()
  .min(1, 'Namespace name must not be empty')
  .max(255, 'Namespace name must be at most 255 characters');

/** Property holding an object's ID */
export const keyFieldSchema = z.string().min(1);

/** Maximum number of items promoted by one apply run; <= 0 means all */
export const applyLimitSchema = z.number().int();

/** Capacity of a bounded input queue */
export const queueCapacitySchema = z.number().int().min(1).max(1_000_000);

export type NamespaceNameInput = z.infer<typeof namespaceNameSchema>;
