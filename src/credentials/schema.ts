/**
 * Service account key file schema.
 */

import { z } from "zod";

/**
 * JSON key file downloaded for a service account. Unknown fields are kept.
 */
export const ServiceAccountKeySchema = z
  .object({
    type: z.literal("service_account"),
    project_id: z.string().optional(),
    private_key_id: z.string().optional(),
    private_key: z.string().min(1, "private_key is required"),
    client_email: z.string().email("client_email must be an email address"),
    client_id: z.string().optional(),
    auth_uri: z.string().optional(),
    token_uri: z.string().optional(),
  })
  .passthrough();

export type ServiceAccountKey = z.infer<typeof ServiceAccountKeySchema>;
