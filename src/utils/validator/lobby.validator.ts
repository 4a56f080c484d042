import { z } from 'zod';

const identifier = z.string().trim().min(1).max(64);

export const LobbyIdSchema = z
  .string()
  .trim()
  .min(1, 'Lobby ID is required')
  .max(32)
  .transform((id) => id.toUpperCase());

// Restaurant cards are passed through as-is; only `name` is required.
// Known optional keys (cuisine, location, address, priceRange, rating,
// reviewCount, mood, description, reviews) keep whatever shape the provider sent.
export const RestaurantSchema = z.looseObject({
  name: z.string().min(1),
});

// --- WebSocket messages ---

const BaseLobbyMessageSchema = z.object({
  lobby_id: LobbyIdSchema,
  player_id: identifier.optional(),
});

export const JoinLobbySchema = BaseLobbyMessageSchema.extend({
  type: z.literal('join_lobby'),
});

export const LeaveLobbySchema = BaseLobbyMessageSchema.extend({
  type: z.literal('leave_lobby'),
});

export const HostUpdateSchema = BaseLobbyMessageSchema.extend({
  type: z.literal('host_update'),
  recommendations: z.array(RestaurantSchema).optional(),
  selection: RestaurantSchema.nullable().optional(),
  location: z.string().max(200).optional(),
  mood: z.string().max(200).optional(),
});

export type JoinLobbyInput = z.infer<typeof JoinLobbySchema>;
export type LeaveLobbyInput = z.infer<typeof LeaveLobbySchema>;
export type HostUpdateInput = z.infer<typeof HostUpdateSchema>;

// --- HTTP bodies ---

export const CreateLobbyBodySchema = z.object({
  host_id: identifier,
});

export const JoinLobbyBodySchema = z.object({
  lobby_id: LobbyIdSchema,
  player_id: identifier,
});

export const SearchBodySchema = z.object({
  location: z.string().trim().min(1, 'location is required').max(200),
  mood: z.string().trim().min(1, 'mood is required').max(200),
});
