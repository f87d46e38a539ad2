import { z } from 'zod';
import rawFields from '../../config/crm-fields.json';

const FieldId = z.number().int().positive();

export const CrmFieldsSchema = z.object({
  contact: z.object({
    contactPhone: FieldId,
    telegramId: FieldId,
    telegramUsername: FieldId,
    language: FieldId,
  }),
  lead: z.object({
    childrenCount: FieldId,
    childrenAges: FieldId,
    program: FieldId,
    enrollment: FieldId,
    enrollmentText: FieldId,
    tourCampus: FieldId,
    tourDateTime: FieldId,
    tourStatus: FieldId,
  }),
  enums: z.object({
    program: z.object({ kindergarten: FieldId, russian: FieldId, ib: FieldId, consultation: FieldId }),
    enrollment: z.object({ this_sem: FieldId, next_year: FieldId, exploring: FieldId }),
    campus: z.record(z.string(), FieldId),
  }),
  enrollmentText: z.object({ this_sem: z.string(), next_year: z.string(), exploring: z.string() }),
});

/** Custom field and enum ids of the CRM account */
export type CrmFields = z.infer<typeof CrmFieldsSchema>;

export function loadCrmFields(): CrmFields {
  return CrmFieldsSchema.parse(rawFields);
}
