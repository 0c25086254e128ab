import { z } from 'zod';
import { InvalidProfileError } from '../engine/errors';

// --- Profile sub-records ---

const optionalText = z.string().trim().optional();

export const EducationSchema = z.object({
  institution: z.string().trim().default(''),
  degree: z.string().trim().default(''),
  field: z.string().trim().default(''),
  startDate: optionalText,
  endDate: optionalText,
});

export const ExperienceSchema = z.object({
  employer: z.string().trim().default(''),
  title: z.string().trim().default(''),
  startDate: optionalText,
  endDate: optionalText,
  description: optionalText,
});

/** Case-insensitive de-duplication, first spelling wins. */
function uniqueSkills(skills: string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const skill of skills) {
    const key = skill.toLowerCase();
    if (!skill || seen.has(key)) continue;
    seen.add(key);
    out.push(skill);
  }
  return out;
}

// --- Profile ---

export const ProfileSchema = z.object({
  fullName: z.string().trim().default(''),
  email: z.union([z.literal(''), z.string().trim().toLowerCase().email()]).default(''),
  phone: z.string().trim().default(''),
  address: optionalText,
  education: z.array(EducationSchema).default([]),
  experience: z.array(ExperienceSchema).default([]),
  skills: z.array(z.string().trim()).default([]).transform(uniqueSkills),
});

export type Education = z.infer<typeof EducationSchema>;
export type Experience = z.infer<typeof ExperienceSchema>;
export type Profile = z.infer<typeof ProfileSchema>;
export type ProfileInput = z.input<typeof ProfileSchema>;

/**
 * Validate an untrusted profile record.
 *
 * The model allows an empty email; a fill run does not, so `fullName` and
 * `email` must both be present and non-blank.
 */
export function parseProfile(input: unknown): Profile {
  const result = ProfileSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidProfileError(
      result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    );
  }

  const missing: Array<{ path: string; message: string }> = [];
  if (!result.data.fullName) missing.push({ path: 'fullName', message: 'required' });
  if (!result.data.email) missing.push({ path: 'email', message: 'required' });
  if (missing.length > 0) throw new InvalidProfileError(missing);

  return result.data;
}
