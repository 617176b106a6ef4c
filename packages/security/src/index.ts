export { PASSWORD_ALPHABET, generatePassword } from "./password-generator";
export {
  RECORD_KEY_LENGTH,
  deriveMasterKey,
  hashMasterPassword,
  validateMasterPassword,
  verifyMasterPasswordHash
} from "./master-key";
export { RecordCipher, decryptToken, encryptToken } from "./record-cipher";
export {
  MasterPasswordGate,
  type MasterPasswordGateOptions,
  type MasterPasswordStoreDB,
  type PasswordPrompt
} from "./master-password-gate";
