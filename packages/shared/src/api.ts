import type {
  CredentialCreateInput,
  CredentialEntry,
  CredentialUpdateInput
} from "../../core/src/index";

export interface DeleteResponse {
  message: string;
}

export interface ErrorResponse {
  detail: string;
}

/** Operations behind the HTTP routes, one per endpoint. */
export interface VaultApi {
  create: (input: CredentialCreateInput) => CredentialEntry;
  listByTitle: (title: string) => CredentialEntry[];
  getOne: (title: string, username: string) => CredentialEntry;
  update: (input: CredentialUpdateInput) => CredentialEntry;
  delete: (title: string, username: string) => DeleteResponse;
  listDistinctTitles: () => string[];
}
