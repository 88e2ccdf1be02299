// =============================================================================
// Platform API Response Schemas
// =============================================================================

import { z } from "zod";

// =============================================================================
// Shared
// =============================================================================

/** Timestamps arrive as ISO 8601 strings. */
const Timestamp = z.string().refine((s) => !Number.isNaN(Date.parse(s)), {
  message: "Invalid timestamp",
});

const Account = z.object({
  email: z.string(),
}).loose();

// =============================================================================
// Error Body
// =============================================================================

export const HerokuErrorSchema = z.object({
  id: z.string(),
  message: z.string(),
}).loose();

export type HerokuError = z.infer<typeof HerokuErrorSchema>;

// =============================================================================
// App Schemas
// =============================================================================

export const HerokuAppSchema = z.object({
  name: z.string(),
  owner: Account,
  created_at: Timestamp,
  released_at: Timestamp.nullable().optional(),
  slug_size: z.number().int().nullable().optional(),
}).loose();

export type HerokuApp = z.infer<typeof HerokuAppSchema>;

export const HerokuAppsListSchema = z.array(HerokuAppSchema);

// =============================================================================
// Release Schemas
// =============================================================================

export const HerokuReleaseSchema = z.object({
  name: z.string(),
  commit: z.string().nullable().optional(),
  user: z.string(),
  created_at: Timestamp,
  description: z.string(),
}).loose();

export type HerokuRelease = z.infer<typeof HerokuReleaseSchema>;

export const HerokuReleasesListSchema = z.array(HerokuReleaseSchema);

// =============================================================================
// Dyno Schemas
// =============================================================================

export const HerokuDynoSchema = z.object({
  name: z.string(),
  state: z.string(),
  command: z.string(),
  updated_at: Timestamp,
}).loose();

export type HerokuDyno = z.infer<typeof HerokuDynoSchema>;

export const HerokuDynosListSchema = z.array(HerokuDynoSchema);

// =============================================================================
// Add-on Schemas
// =============================================================================

export const HerokuAddonSchema = z.object({
  id: z.string(),
  name: z.string(),
  plan: z.object({
    name: z.string(),
  }).loose(),
  owner: Account.nullable().optional(),
}).loose();

export type HerokuAddon = z.infer<typeof HerokuAddonSchema>;

export const HerokuAddonsListSchema = z.array(HerokuAddonSchema);

/** Binds an add-on to an app under a config var name. */
export const HerokuAttachmentSchema = z.object({
  id: z.string(),
  name: z.string(),
  addon: z.object({
    id: z.string(),
    name: z.string(),
  }).loose(),
}).loose();

export type HerokuAttachment = z.infer<typeof HerokuAttachmentSchema>;

export const HerokuAttachmentsListSchema = z.array(HerokuAttachmentSchema);

// =============================================================================
// Credentials File
// =============================================================================

export const CredentialsSchema = z.object({
  apiKey: z.string().min(1),
});

export type Credentials = z.infer<typeof CredentialsSchema>;
