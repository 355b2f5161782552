import { getCalendar, getListingDetails, getPricing } from '../providers/airbnb.js';
import type { ListingSnapshot } from '../types.js';

export async function getListingSnapshot(params: {
  roomId: string;
  checkIn: string;
  checkOut: string;
  adults: number;
}): Promise<ListingSnapshot> {
  const [details, pricing, calendar] = await Promise.all([
    getListingDetails(params.roomId),
    getPricing(params.roomId, params.checkIn, params.checkOut, params.adults),
    getCalendar(params.roomId, params.checkIn, params.checkOut)
  ]);

  return { calendar, details, pricing };
}
