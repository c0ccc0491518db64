// src/types/itinerary.ts
import type { InventorySource } from './inventory';

export type TravelerType = string;

export interface TravelerPreferences {
  origin?: string;
  destinations: string[];
  /** YYYY-MM-DD */
  startDate: string;
  /** YYYY-MM-DD, on or after startDate */
  endDate: string;
  budgetTotal: number;
  interests: string[];
  travelerType: TravelerType;
  currency?: string;
}

export interface Hotel {
  id: string;
  name: string;
  city: string;
  pricePerNight: number;
  rating?: number;
  source: InventorySource | 'placeholder';
}

export interface Activity {
  id: string;
  name: string;
  city: string;
  category: string;
  entryFee: number;
  durationMinutes: number;
  bestTimeHint: string;
  date?: string;
  source: InventorySource;
}

export interface FlightSegment {
  carrier: string;
  from: string;
  to: string;
  price: number;
  durationMinutes?: number;
  source: InventorySource | 'synthetic';
}

export interface TransportSegment {
  mode: string;
  provider: string;
  from: string;
  to: string;
  price: number;
}

export interface DayPlan {
  dayIndex: number;
  city: string;
  hotel: Hotel | null;
  activities: Activity[];
  transportSegments: TransportSegment[];
  flight: FlightSegment | null;
  notes: string;
  estimatedDayCost: number;
}

export interface TripCost {
  hotelTotal: number;
  activitiesTotal: number;
  transportTotal: number;
  flightsTotal: number;
  total: number;
}

/** Pre-trip split of the budget; `total` echoes the (floored) input. */
export interface BudgetAllocation {
  hotelTotal: number;
  activitiesTotal: number;
  transportTotal: number;
  total: number;
}

export interface Itinerary {
  tripId: string;
  summaryText: string;
  highlights: string[];
  days: DayPlan[];
  cost: TripCost;
  assumptions: string[];
}

export type MissingHotelPolicy = 'skip' | 'placeholder';

export type RouteScope = 'international' | 'domestic';
