import { z } from "zod";
import { DEFAULT_CREDENTIAL_URL } from "../../core/src/index";
import { trimToOptionalString } from "./validation";

// Title and username are the record identity and are matched exactly, so they are not trimmed.
const identitySchema = z.string().min(1);

export const credentialCreateSchema = z
  .object({
    title: identitySchema,
    username: identitySchema,
    url: z.preprocess(trimToOptionalString, z.string().optional().default(DEFAULT_CREDENTIAL_URL)),
    password: z.string().min(1).optional(),
    generate: z.boolean().optional().default(false)
  })
  .refine((input) => input.generate || input.password !== undefined, {
    message: "password is required unless generate is true",
    path: ["password"]
  });

export const credentialUpdateSchema = z.object({
  title: identitySchema,
  username: identitySchema,
  url: z.preprocess(trimToOptionalString, z.string().optional()),
  password: z.string().min(1).optional(),
  generate: z.boolean().optional().default(false)
});

export const credentialTitleParamsSchema = z.object({
  title: identitySchema
});

export const credentialKeyParamsSchema = z.object({
  title: identitySchema,
  username: identitySchema
});

export type CredentialCreateRequest = z.infer<typeof credentialCreateSchema>;
export type CredentialUpdateRequest = z.infer<typeof credentialUpdateSchema>;
export type CredentialTitleParams = z.infer<typeof credentialTitleParamsSchema>;
export type CredentialKeyParams = z.infer<typeof credentialKeyParamsSchema>;
