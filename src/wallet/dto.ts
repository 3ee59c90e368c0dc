import { z } from 'zod';

export const RegistrationDTO = z.object({
  pushToken: z.string().min(1),
});
export type RegistrationDTO = z.infer<typeof RegistrationDTO>;

export const ErrorLogDTO = z.object({
  logs: z.array(z.string()),
});
export type ErrorLogDTO = z.infer<typeof ErrorLogDTO>;

export const PersonalizationDictionaryDTO = z.object({
  personalizationToken: z.string().min(1),
  requiredPersonalizationInfo: z.object({
    fullName: z.string().optional(),
    givenName: z.string().optional(),
    familyName: z.string().optional(),
    emailAddress: z.string().optional(),
    postalCode: z.string().optional(),
    ISOCountryCode: z.string().optional(),
    phoneNumber: z.string().optional(),
  }),
});
export type PersonalizationDictionaryDTO = z.infer<typeof PersonalizationDictionaryDTO>;

/** Response body of the change-polling endpoint. */
export interface ChangedArtifactsDTO {
  lastUpdated: string;
  serialNumbers?: string[];
  orderIdentifiers?: string[];
}
