import type { AiMessage, RawGpsPoint, RawTaxiTrip } from '@taxi-analytics/domain';

const SYSTEM_PROMPT = `You are a mobility data analyst for a city taxi fleet.
Answer with a single JSON object and nothing else: no prose before or after it.`;

export function gpsContext(index: number, point: RawGpsPoint): string {
  return `GPS point ${index} of batch, speed: ${point.spd.toFixed(2)} m/s`;
}

export function tripContext(index: number, trip: RawTaxiTrip): string {
  return `Taxi trip ${index} of batch, ${trip.numPassengers} passengers`;
}

export function buildGpsMessages(point: RawGpsPoint, context: string): AiMessage[] {
  return [
    { role: 'system', content: SYSTEM_PROMPT },
    {
      role: 'user',
      content: `Analyze this GPS data point and provide insights:
Latitude: ${point.lat}
Longitude: ${point.lng}
Altitude: ${point.alt}
Speed: ${point.spd} m/s
Azimuth: ${point.azm}
Context: ${context}

Please provide:
1. Area classification (North/Center/South based on latitude)
2. Activity level (High/Medium/Low based on speed and context)
3. Road type prediction (Highway/Street/Residential)
4. Any interesting patterns or insights

Return as JSON with keys: area_classification, activity_level, road_type, insights`,
    },
  ];
}

export function buildTripMessages(trip: RawTaxiTrip, context: string): AiMessage[] {
  return [
    { role: 'system', content: SYSTEM_PROMPT },
    {
      role: 'user',
      content: `Analyze this taxi trip data and provide insights:
Duration: ${trip.tripDurationMin} minutes
Distance: ${trip.distanceKm} km
Speed: ${trip.kph} km/h
Fare: ${trip.totalFare} USD
Passengers: ${trip.numPassengers}
Surge pricing: ${trip.surgeApplied}
Context: ${context}

Please provide:
1. Trip category (Short/Medium/Long based on duration and distance)
2. Price category (Low/Medium/High/Premium based on fare per km)
3. Time efficiency score (0-1 based on speed and duration)
4. Any interesting patterns or insights

Return as JSON with keys: trip_category, price_category, efficiency_score, insights`,
    },
  ];
}
