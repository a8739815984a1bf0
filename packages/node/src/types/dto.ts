/**
 * Request DTOs with Zod validation schemas.
 *
 * These check shape only. Name length and signature are admission
 * rules of the node and come back as an `invalid` status.
 */

import { z } from "zod";
import { MAX_PET_ID, SPECIES } from "@petledger/types";

// =============================================================================
// Commands
// =============================================================================

export const SpeciesSchema = z.enum(SPECIES);

export const PetIdSchema = z.number().int().min(0).max(MAX_PET_ID);

export const CommandSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("mint"),
    name: z.string(),
    species: SpeciesSchema,
    id: PetIdSchema,
  }),
  z.object({ kind: z.literal("transfer"), receiver: z.string().min(1) }),
  z.object({ kind: z.literal("feed") }),
  z.object({ kind: z.literal("sleep") }),
]);

export const SignedEnvelopeSchema = z.object({
  signer: z.string().min(1),
  nonce: z.number().int().min(0),
  command: CommandSchema,
  signature: z.string().min(1),
});

export type SignedEnvelopeDto = z.infer<typeof SignedEnvelopeSchema>;

// =============================================================================
// Params and queries
// =============================================================================

export const PetIdParamSchema = z.coerce.number().int().min(0).max(MAX_PET_ID);

export const RecentEventsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export type RecentEventsQuery = z.infer<typeof RecentEventsQuerySchema>;
