import { z } from "zod";

export const linearCredentialsSchema = z.object({
  apiKey: z.string().min(1, "Linear API key is required"),
  endpoint: z.string().url().optional(),
});

/** Subset of a Google service-account key file used for JWT auth. */
export const serviceAccountSchema = z.object({
  type: z.literal("service_account").optional(),
  project_id: z.string().optional(),
  client_email: z.string().email("client_email must be an email"),
  private_key: z.string().min(1, "private_key is required"),
});

export type GoogleCredentials =
  | { keyFile: string }
  | { serviceAccount: ServiceAccount };

export type LinearCredentials = z.infer<typeof linearCredentialsSchema>;
export type ServiceAccount = z.infer<typeof serviceAccountSchema>;
