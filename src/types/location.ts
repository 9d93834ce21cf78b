/**
 * Location & Storage Space Types
 *
 * A location is a warehouse stock location, keyed by the same code intakes
 * carry in `location_id`. Freezer locations hold storage spaces (bins) that
 * intake lines can be placed in. A capacity of 0 or absent means unbounded.
 */

export interface StorageLocation {
  /** Location code, e.g. wh/cold-1 */
  id: string;
  name: string;
  company_id: string;
  is_freezer: boolean;
  temperature_range_min?: number;
  temperature_range_max?: number;
  /** Cubic meters */
  max_volume?: number;
  /** Kilograms */
  max_weight?: number;
}

export interface StorageSpace {
  id: string;
  name: string;
  company_id: string;
  /** Freezer location the space sits in */
  location_id: string;
  max_volume?: number;
  max_weight?: number;
  /** Inactive spaces are under maintenance and take no goods */
  active: boolean;
  notes?: string;
}

export type AvailabilityStatus = 'available' | 'occupied' | 'maintenance';

export interface CapacityUsage {
  current_volume: number;
  current_weight: number;
  /** Percent of max_volume in use, 0 when unbounded */
  volume_utilization: number;
  weight_utilization: number;
}

export interface LocationCapacity extends CapacityUsage {
  location_id: string;
  /** Open intakes stored at the location */
  intake_count: number;
}

export interface SpaceCapacity extends CapacityUsage {
  space_id: string;
  location_id: string;
  is_available: boolean;
  availability_status: AvailabilityStatus;
}

export type CreateLocationParams = Omit<StorageLocation, 'is_freezer'> & { is_freezer?: boolean };

export interface CreateSpaceParams {
  name: string;
  company_id: string;
  location_id: string;
  max_volume?: number;
  max_weight?: number;
  active?: boolean;
  notes?: string;
}
