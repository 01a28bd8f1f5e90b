/**
 * Location Resolver
 *
 * Turns a meeting's location choice into a search anchor:
 * - CenterLocation: centroid of the participants' points
 * - PreferenceArea: geocoded voted district
 * - PreferenceSubway: searched voted station
 *
 * Provider failures never escape; each one is recorded on the run's
 * DegradationLog and the resolver falls back to a district-only anchor.
 */

import { DEFAULT_SEARCH_RADIUS_M } from '../../../config/index.js';
import { DegradationLog, settle } from '../degradation.js';
import type { PlaceSearchProvider } from '../providers.js';
import type { CenterLocation, GeoPoint, MeetingContext, ParticipantLocation } from '../types.js';
import { districtFromAddress, mostFrequent } from './district.js';
import { centroid, sentinelLocation } from './geo.js';
import { StationDirectory, normalizeStationName, stationSearchQuery } from './station-directory.js';

export type LocationRequest = Pick<
  MeetingContext,
  'locationChoiceType' | 'participantLocations' | 'preferredDistrict' | 'preferredStation'
>;

export interface LocationResolverOptions {
  /** Prefix for district geocoding, e.g. "서울". */
  city: string;
  stations: StationDirectory;
}

interface ParticipantPoint {
  point?: GeoPoint;
  district?: string;
}

export class LocationResolver {
  constructor(
    private readonly provider: PlaceSearchProvider | null,
    private readonly options: LocationResolverOptions
  ) {}

  /**
   * Resolve the anchor for a meeting, or null when nothing is known.
   */
  async resolve(request: LocationRequest, log: DegradationLog = new DegradationLog()): Promise<CenterLocation | null> {
    const location = await this.resolveByChoice(request, log);

    if (!location) {
      log.record(
        { stage: 'location', code: 'anchor_unresolved', detail: request.locationChoiceType },
        { locationChoiceType: request.locationChoiceType }
      );
    }
    return location;
  }

  private resolveByChoice(request: LocationRequest, log: DegradationLog): Promise<CenterLocation | null> {
    switch (request.locationChoiceType) {
      case 'CenterLocation':
        return this.resolveCenter(request.participantLocations, log);
      case 'PreferenceArea':
        return this.resolveArea(request.preferredDistrict, log);
      case 'PreferenceSubway':
        return this.resolveStation(request.preferredStation, log);
    }
  }

  private async resolveCenter(participants: readonly ParticipantLocation[], log: DegradationLog): Promise<CenterLocation | null> {
    const resolved = await Promise.all(participants.map(p => this.locateParticipant(p, log)));

    const points = resolved.flatMap(r => (r.point ? [r.point] : []));
    const fallbackDistrict = mostFrequent(resolved.flatMap(r => (r.district ? [r.district] : [])));

    if (points.length === 0) {
      return fallbackDistrict ? sentinelLocation(fallbackDistrict) : null;
    }

    const center = centroid(points);
    const district = (await this.districtAt(center, log)) ?? fallbackDistrict;
    return district ? { ...center, district } : center;
  }

  private async locateParticipant(participant: ParticipantLocation, log: DegradationLog): Promise<ParticipantPoint> {
    const { latitude, longitude, address, district } = participant;
    if (latitude !== undefined && longitude !== undefined) {
      return { point: { latitude, longitude }, district };
    }
    const provider = this.provider;
    if (!address || !provider) {
      return { district };
    }

    const outcome = await settle(() => provider.resolveAddress(address), 'location', 'geocode_failed');
    const matches = log.unwrap(outcome, { participantId: participant.participantId });
    const match = matches?.[0];
    if (!match) {
      if (matches) {
        log.record(
          { stage: 'location', code: 'geocode_failed', detail: 'no match for address' },
          { participantId: participant.participantId }
        );
      }
      return { district };
    }
    return {
      point: { latitude: match.latitude, longitude: match.longitude },
      district: district ?? match.district ?? districtFromAddress(match.formattedAddress),
    };
  }

  private async districtAt(point: GeoPoint, log: DegradationLog): Promise<string | undefined> {
    const provider = this.provider;
    if (!provider) return undefined;
    const outcome = await settle(
      () => provider.reverseGeocode(point.latitude, point.longitude),
      'location',
      'reverse_geocode_failed'
    );
    return log.unwrap(outcome) ?? undefined;
  }

  private async resolveArea(district: string | undefined, log: DegradationLog): Promise<CenterLocation | null> {
    if (!district) return null;
    const provider = this.provider;
    if (!provider) return sentinelLocation(district);

    const outcome = await settle(
      () => provider.resolveAddress(`${this.options.city} ${district}`),
      'location',
      'geocode_failed'
    );
    const matches = log.unwrap(outcome, { district });
    const match = matches?.[0];
    if (!match) {
      if (matches) {
        log.record({ stage: 'location', code: 'geocode_failed', detail: 'no match for district' }, { district });
      }
      return sentinelLocation(district);
    }
    return {
      latitude: match.latitude,
      longitude: match.longitude,
      address: match.formattedAddress,
      district,
    };
  }

  private async resolveStation(station: string | undefined, log: DegradationLog): Promise<CenterLocation | null> {
    if (!station) return null;
    const name = normalizeStationName(station);
    const tableDistrict = this.options.stations.districtFor(name);

    const provider = this.provider;
    if (provider) {
      const outcome = await settle(
        () => provider.searchByKeyword({
          query: stationSearchQuery(name),
          radiusMeters: DEFAULT_SEARCH_RADIUS_M,
          pageSize: 1,
        }),
        'location',
        'station_lookup_failed'
      );
      const results = log.unwrap(outcome, { station: name });
      const top = results?.[0];
      if (top) {
        const address = top.roadAddress ?? top.address;
        const district = districtFromAddress(top.roadAddress) ?? districtFromAddress(top.address) ?? tableDistrict;
        const location: CenterLocation = { latitude: top.latitude, longitude: top.longitude, address };
        return district ? { ...location, district } : location;
      }
      if (results) {
        log.record({ stage: 'location', code: 'station_lookup_failed', detail: 'no result for station' }, { station: name });
      }
    }

    if (!tableDistrict) {
      log.record({ stage: 'location', code: 'station_unknown', detail: name }, { station: name });
      return null;
    }
    return sentinelLocation(tableDistrict);
  }
}
