import { z } from 'zod';
import type { TravelerPreferences } from '@/types/itinerary';
import type { ValidationIssue } from '@/utils/errors';
import { toTitleCase } from '@/utils/text';

const cityName = z
  .string()
  .trim()
  .min(1, 'City name cannot be empty')
  .transform((c) => toTitleCase(c));

const isoDate = z.string().trim().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date');

// Request body for POST /api/itinerary (snake_case on the wire)
export const itineraryRequestSchema = z.object({
  origin: z
    .string()
    .trim()
    .optional()
    .transform((o) => (o ? toTitleCase(o) : undefined)),
  destination: z
    .union([cityName, z.array(cityName).min(1, 'At least one destination is required')])
    .transform((d) => (Array.isArray(d) ? d : [d])),
  start_date: isoDate,
  end_date: isoDate,
  budget_total: z.coerce.number().positive('budget_total must be greater than 0'),
  interests: z.array(z.string().trim().min(1)).optional().default([]),
  traveler_type: z.string().trim().min(1).optional().default('solo'),
  currency: z.string().trim().min(1).optional(),
});

export type ItineraryRequestBody = z.infer<typeof itineraryRequestSchema>;

export function toTravelerPreferences(body: ItineraryRequestBody): TravelerPreferences {
  const prefs: TravelerPreferences = {
    destinations: body.destination,
    startDate: body.start_date,
    endDate: body.end_date,
    budgetTotal: body.budget_total,
    interests: body.interests,
    travelerType: body.traveler_type,
  };
  if (body.origin) prefs.origin = body.origin;
  if (body.currency) prefs.currency = body.currency;
  return prefs;
}

/**
 * Validates an itinerary request body
 * @returns Typed preferences, or the issues keyed by field path
 */
export function validateItineraryRequest(data: unknown):
  | { success: true; data: TravelerPreferences }
  | { success: false; error: ValidationIssue[] } {
  const result = itineraryRequestSchema.safeParse(data);

  if (!result.success) {
    return {
      success: false,
      error: result.error.errors.map((e) => ({
        path: e.path.join('.') || 'root',
        message: e.message,
      })),
    };
  }

  return { success: true, data: toTravelerPreferences(result.data) };
}
