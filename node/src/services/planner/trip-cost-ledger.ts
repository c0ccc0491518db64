import type { TripCost } from '@/types/itinerary';
import { roundCurrency } from './budget-allocator';

/** Anything route planning can charge a flight price to. */
export interface FlightLedger {
  addFlight(price: number): void;
}

/**
 * Running actual-spend totals for one build. Owned by the assembler and written from one
 * place at a time; `total` is always the sum of the four subtotals.
 */
export class TripCostLedger implements FlightLedger {
  private hotel = 0;
  private activities = 0;
  private transport = 0;
  private flights = 0;

  addHotel(amount: number): void {
    this.hotel += amount;
  }

  addActivities(amount: number): void {
    this.activities += amount;
  }

  addTransport(amount: number): void {
    this.transport += amount;
  }

  addFlight(price: number): void {
    this.flights += price;
  }

  get flightsTotal(): number {
    return this.flights;
  }

  toTripCost(): TripCost {
    const hotelTotal = roundCurrency(this.hotel);
    const activitiesTotal = roundCurrency(this.activities);
    const transportTotal = roundCurrency(this.transport);
    const flightsTotal = roundCurrency(this.flights);
    return {
      hotelTotal,
      activitiesTotal,
      transportTotal,
      flightsTotal,
      total: roundCurrency(hotelTotal + activitiesTotal + transportTotal + flightsTotal),
    };
  }
}
