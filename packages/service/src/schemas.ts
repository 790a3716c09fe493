/**
 * Intake schemas.
 *
 * Zod schemas for the JSON the upstream collaborators send: structured
 * receipts, splitting instructions, and the scanning service's raw
 * output. Shape only; the engine checks every receipt and allocation
 * invariant itself.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

export const MoneySchema = z.object({
  amount: z.string().min(1),
  currency: z.string().min(1),
  decimals: z.number().int().min(0).max(18),
});

/** Number, decimal string or fraction string */
export const RationalSchema = z.union([z.number().nonnegative(), z.string().min(1)]);

// =============================================================================
// Receipt
// =============================================================================

export const ReceiptLineSchema = z.object({
  id: z.string().min(1).max(128),
  description: z.string(),
  quantity: RationalSchema,
  unitPrice: MoneySchema,
  lineTotal: MoneySchema,
});

export const ChargeLineSchema = z.object({
  id: z.string().min(1).max(128),
  kind: z.enum(["tax", "service_charge", "discount"]),
  value: MoneySchema,
  basis: z.enum(["flat", "percentage_of_subtotal"]),
  rate: RationalSchema.optional(),
  description: z.string().optional(),
});

export const ReceiptSchema = z.object({
  lines: z.array(ReceiptLineSchema),
  charges: z.array(ChargeLineSchema).default([]),
  grandTotal: MoneySchema,
});

export type ReceiptDto = z.infer<typeof ReceiptSchema>;

// =============================================================================
// Allocation
// =============================================================================

export const ParticipantSchema = z.object({
  id: z.string().min(1).max(128),
  displayName: z.string().min(1),
});

export const ShareSchema = z.object({
  participantId: z.string().min(1),
  weight: RationalSchema.default(1),
});

export const AllocationSchema = z.object({
  participants: z.array(ParticipantSchema),
  lines: z.array(
    z.object({
      lineId: z.string().min(1),
      shares: z.array(ShareSchema),
    }),
  ),
  charges: z
    .array(
      z.object({
        chargeId: z.string().min(1),
        policy: z.enum([
          "proportional_to_item_share",
          "equal_split_across_participants",
          "assigned_to_specific_participants",
        ]),
        shares: z.array(ShareSchema).optional(),
      }),
    )
    .optional(),
});

export type AllocationDto = z.infer<typeof AllocationSchema>;

// =============================================================================
// Scanned receipt
// =============================================================================

/**
 * Raw output of the receipt-scanning service. Amounts are JSON numbers
 * in major units; `currency` is usually a display symbol such as "$".
 */
export const ScannedReceiptSchema = z.object({
  items: z.array(
    z.object({
      name: z.string().min(1),
      price: z.number().nonnegative(),
      quantity: z.number().positive().default(1),
    }),
  ),
  subtotal: z.number().optional(),
  tax: z.number().nonnegative().default(0),
  service_charge: z.number().nonnegative().default(0),
  total: z.number(),
  currency: z.string().optional(),
});

export type ScannedReceipt = z.infer<typeof ScannedReceiptSchema>;
