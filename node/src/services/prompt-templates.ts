// node/src/services/prompt-templates.ts: narrative prompt for the itinerary summary

export interface NarrativePromptParams {
  origin?: string;
  destinations: string[];
  startDate: string;
  endDate: string;
  travelerType: string;
  budgetTotal: number;
  currency: string;
  interests: string[];
  /** Plain-text digest of the plan that was actually built (hotels, activities, legs). */
  context: string;
}

export const NARRATIVE_SYSTEM =
  'You are a professional travel planner. You describe itineraries that were already built; you never invent bookings. Respond in JSON only.';

export function buildNarrativePrompt(params: NarrativePromptParams): string {
  const interests = params.interests.length > 0 ? params.interests.join(', ') : 'general sightseeing';
  return `
Use the planned itinerary below to write an engaging, accurate summary.

User preferences:
- Origin: ${params.origin ?? 'not specified'}
- Destinations: ${params.destinations.join(', ')}
- Dates: ${params.startDate} → ${params.endDate}
- Traveler type: ${params.travelerType}
- Budget: ${params.budgetTotal} ${params.currency}
- Interests: ${interests}

Planned itinerary:
${params.context || 'No plan details available.'}

Instructions:
1. Summarize the trip in 2–4 sentences, naming the cities in order.
2. List 3–6 highlights, each a short phrase drawn from the planned activities, hotels or routes.
3. Add one short paragraph on why the plan fits the traveler's profile and budget.
4. Keep the tone friendly and realistic. Mention only places that appear in the planned itinerary.

Return JSON exactly in this shape:
{
  "summary_text": "...",
  "highlights": ["...", "..."],
  "ai_commentary": "..."
}
`.trim();
}
