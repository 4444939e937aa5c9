/**
 * WHAT: Resolve readings to cities through the station → location hierarchy.
 * WHY: All three statistics stages consume the same flat relation; it is built once.
 * HOW: Hash both lookup tables, then one pass over readings with inner-join semantics.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { CityReading, RowKey, WeatherDataset } from "./types.js";

/**
 * joinReadingsToCities
 * WHAT: Inner join Reading ⋈ Station ⋈ Location, projected to (reading, city).
 *
 * A reading whose station is unknown, or whose station points at an unknown
 * location, is dropped. That is ordinary missing data, not an error.
 * Duplicate station or location keys: the last row wins.
 * Output keeps reading order, which is the tie-break order downstream.
 */
export function joinReadingsToCities(dataset: WeatherDataset): CityReading[] {
  const cityByLocation = new Map<RowKey, string>();
  for (const location of dataset.locations) {
    cityByLocation.set(location.location_id, location.city);
  }

  const locationByStation = new Map<RowKey, RowKey>();
  for (const station of dataset.stations) {
    locationByStation.set(station.station_id, station.location_id);
  }

  const rows: CityReading[] = [];
  for (const reading of dataset.readings) {
    const locationId = locationByStation.get(reading.station_id);
    if (locationId === undefined) continue;

    const city = cityByLocation.get(locationId);
    if (city === undefined) continue;

    rows.push({
      reading_date: reading.reading_date,
      station_id: reading.station_id,
      city,
      temperature: reading.temperature,
    });
  }

  return rows;
}
