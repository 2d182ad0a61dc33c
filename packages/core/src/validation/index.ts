export {
  verificationSettingsSchema,
  verificationModeSchema,
  verificationRequestSchema,
  parseVerificationSettings,
  parseVerificationRequest,
} from './schemas.js';
export type {
  VerificationSettings,
  VerificationSettingsInput,
  VerificationRequestInput,
} from './schemas.js';
