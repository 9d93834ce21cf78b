/**
 * Locations, storage spaces and their capacity
 *
 * Usage is derived from open intakes on every read, never stored:
 * - a freezer location counts every line of its open intakes
 * - a space counts the lines placed in it that still hold goods
 */

import { v4 as uuidv4 } from 'uuid';
import { isOpenIntake } from './billing';
import { NotFoundError, ValidationError } from './errors';
import type { Intake } from '../types/intake';
import type {
  AvailabilityStatus,
  CapacityUsage,
  CreateLocationParams,
  CreateSpaceParams,
  LocationCapacity,
  SpaceCapacity,
  StorageLocation,
  StorageSpace,
} from '../types/location';
import type { WarehouseServices } from '../types/services';

/** 0 or absent means unbounded; anything else must be positive */
export function validateCapacity(limits: { max_volume?: number; max_weight?: number }): void {
  if (limits.max_volume !== undefined && limits.max_volume < 0) {
    throw new ValidationError('Maximum volume must be positive.');
  }
  if (limits.max_weight !== undefined && limits.max_weight < 0) {
    throw new ValidationError('Maximum weight must be positive.');
  }
}

export function validateLocation(location: StorageLocation): void {
  validateCapacity(location);
  const { temperature_range_min: min, temperature_range_max: max } = location;
  if (location.is_freezer && min !== undefined && max !== undefined && min > max) {
    throw new ValidationError('Minimum temperature cannot be greater than maximum temperature.');
  }
}

export function utilizationPercent(current: number, max: number | undefined): number {
  return max !== undefined && max > 0 ? (current * 100) / max : 0;
}

function usage(
  current_volume: number,
  current_weight: number,
  limits: { max_volume?: number; max_weight?: number }
): CapacityUsage {
  return {
    current_volume,
    current_weight,
    volume_utilization: utilizationPercent(current_volume, limits.max_volume),
    weight_utilization: utilizationPercent(current_weight, limits.max_weight),
  };
}

/** Usage of a location by its open intakes; non-freezer locations report none */
export function computeLocationCapacity(location: StorageLocation, intakes: Intake[]): LocationCapacity {
  const open = intakes.filter((intake) => intake.location_id === location.id && isOpenIntake(intake));
  let volume = 0;
  let weight = 0;

  if (location.is_freezer) {
    for (const line of open.flatMap((intake) => intake.lines)) {
      volume += line.volume;
      weight += line.weight;
    }
  }

  return {
    location_id: location.id,
    intake_count: open.length,
    ...usage(volume, weight, location),
  };
}

export function availabilityStatus(
  space: Pick<StorageSpace, 'active' | 'max_volume' | 'max_weight'>,
  current: Pick<CapacityUsage, 'current_volume' | 'current_weight'>
): { is_available: boolean; availability_status: AvailabilityStatus } {
  const full = (used: number, max: number | undefined) => max !== undefined && max > 0 && used >= max;

  if (!space.active) {
    return { is_available: false, availability_status: 'maintenance' };
  }
  if (full(current.current_volume, space.max_volume) || full(current.current_weight, space.max_weight)) {
    return { is_available: false, availability_status: 'occupied' };
  }
  if (current.current_volume > 0 || current.current_weight > 0) {
    // Partly filled: still takes goods
    return { is_available: true, availability_status: 'occupied' };
  }
  return { is_available: true, availability_status: 'available' };
}

/** Usage of a space by lines of open intakes that still hold goods */
export function computeSpaceCapacity(space: StorageSpace, intakes: Intake[]): SpaceCapacity {
  let volume = 0;
  let weight = 0;

  for (const intake of intakes) {
    if (!isOpenIntake(intake)) continue;
    for (const line of intake.lines) {
      if (line.space_id === space.id && line.qty_out < line.qty_in) {
        volume += line.volume;
        weight += line.weight;
      }
    }
  }

  const current = usage(volume, weight, space);
  return {
    space_id: space.id,
    location_id: space.location_id,
    ...current,
    ...availabilityStatus(space, current),
  };
}

export async function loadLocation(locationId: string, services: WarehouseServices): Promise<StorageLocation> {
  const location = await services.locations.get(locationId);
  if (!location) {
    throw new NotFoundError(`Location ${locationId} not found.`);
  }
  return location;
}

export async function loadSpace(spaceId: string, services: WarehouseServices): Promise<StorageSpace> {
  const space = await services.spaces.get(spaceId);
  if (!space) {
    throw new NotFoundError(`Storage space ${spaceId} not found.`);
  }
  return space;
}

/** Create or replace the record of a location */
export async function saveLocation(
  params: CreateLocationParams,
  services: WarehouseServices
): Promise<StorageLocation> {
  if (!params.name.trim()) {
    throw new ValidationError('Location name is required.');
  }

  const location: StorageLocation = { ...params, is_freezer: params.is_freezer ?? false };
  validateLocation(location);

  await services.locations.save(location);
  services.logger.info({ location_id: location.id, is_freezer: location.is_freezer }, 'location saved');
  return location;
}

export async function createSpace(
  params: CreateSpaceParams,
  services: WarehouseServices
): Promise<StorageSpace> {
  if (!params.name.trim()) {
    throw new ValidationError('Space name is required.');
  }
  validateCapacity(params);

  const location = await loadLocation(params.location_id, services);
  if (!location.is_freezer) {
    throw new ValidationError(`Location ${location.name} is not a freezer.`);
  }

  const space: StorageSpace = {
    ...params,
    id: `space_${uuidv4().slice(0, 8)}`,
    name: params.name.trim(),
    active: params.active ?? true,
  };

  await services.spaces.save(space);
  services.logger.info({ space_id: space.id, location_id: space.location_id }, 'storage space created');
  return space;
}

export async function getLocationCapacity(
  locationId: string,
  services: WarehouseServices
): Promise<LocationCapacity> {
  const [location, intakes] = await Promise.all([
    loadLocation(locationId, services),
    services.intakes.list(),
  ]);
  return computeLocationCapacity(location, intakes);
}

export async function getSpaceCapacity(
  spaceId: string,
  services: WarehouseServices
): Promise<SpaceCapacity> {
  const [space, intakes] = await Promise.all([loadSpace(spaceId, services), services.intakes.list()]);
  return computeSpaceCapacity(space, intakes);
}

/** Every line placed in a space must name an active space of the intake's location */
export async function checkLinePlacement(
  locationId: string,
  spaceIds: string[],
  services: WarehouseServices
): Promise<void> {
  for (const spaceId of new Set(spaceIds)) {
    const space = await services.spaces.get(spaceId);
    if (!space) {
      throw new ValidationError(`Storage space ${spaceId} not found.`);
    }
    if (space.location_id !== locationId) {
      throw new ValidationError(`Storage space ${space.name} is not in location ${locationId}.`);
    }
    if (!space.active) {
      throw new ValidationError(`Storage space ${space.name} is under maintenance.`);
    }
  }
}
