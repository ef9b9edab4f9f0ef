import { z } from 'zod';

const channelSchema = z.number().int().min(0).max(255);

export const rgbSchema = z.object({
  r: channelSchema,
  g: channelSchema,
  b: channelSchema
});

export const shadeSystemIdSchema = z.enum(['vita-classical', 'vita-3d-master', 'ivoclar-chromascop']);

export const shadeGuideSetSchema = z.object({
  version: z.string().min(1),
  systems: z.array(
    z.object({
      id: shadeSystemIdSchema,
      name: z.string().min(1),
      shades: z.array(
        z.object({
          label: z.string().min(1),
          rgb: rgbSchema
        })
      )
    })
  )
});

export const samplingModeSchema = z.enum(['average', 'center', 'point', 'rect']);

export const sampleRegionSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('point'), x: z.number(), y: z.number() }),
  z.object({ kind: z.literal('rect'), x: z.number(), y: z.number(), width: z.number(), height: z.number() })
]);

export const patientInfoSchema = z.object({
  name: z.string().trim().min(1, 'patient name is required'),
  age: z.number().int('age must be a whole number').min(1, 'age must be at least 1').max(120, 'age must be at most 120'),
  sex: z.enum(['Male', 'Female', 'Other'])
});

export const manualOverrideSchema = z.object({
  systemId: shadeSystemIdSchema.optional(),
  shade: z.string().trim().min(1, 'override shade is required')
});

export const shadeMatchSchema = z.object({
  systemId: shadeSystemIdSchema,
  systemName: z.string(),
  shade: z.string(),
  deltaE: z.number()
});

export const patientRecordSchema = z.object({
  id: z.string().min(1),
  patient: patientInfoSchema,
  sampledColor: rgbSchema,
  sampledHex: z.string(),
  samplingMode: samplingModeSchema,
  matches: z.array(shadeMatchSchema),
  manualOverride: manualOverrideSchema.nullable(),
  imagePath: z.string(),
  pdfPath: z.string(),
  createdAt: z.string().datetime()
});

export const patientHistorySchema = z.array(patientRecordSchema);

export const submissionSchema = z
  .object({
    imagePath: z.string().min(1, 'an image is required'),
    patient: patientInfoSchema,
    systems: z.array(shadeSystemIdSchema).min(1, 'select at least one shade system'),
    samplingMode: samplingModeSchema,
    region: sampleRegionSchema.optional(),
    manualOverride: manualOverrideSchema.optional()
  })
  .superRefine((submission, ctx) => {
    const { samplingMode, region } = submission;
    if ((samplingMode === 'point' || samplingMode === 'rect') && region?.kind !== samplingMode) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['region'],
        message: `sampling mode "${samplingMode}" needs a ${samplingMode} region`
      });
    }
  });

export type ShadeSubmission = z.infer<typeof submissionSchema>;

/**
 * Flatten zod issues into "path: message" strings
 */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}
