import { z } from 'zod';

export const UpdateStatusSchema = z.object({
  status: z.enum(['completed', 'no_show']),
});

export const LinkClinicalDocumentSchema = z.object({
  clinical_document_id: z.string().uuid().nullable(),
});

export type UpdateStatusDto = z.infer<typeof UpdateStatusSchema>;
export type LinkClinicalDocumentDto = z.infer<typeof LinkClinicalDocumentSchema>;
