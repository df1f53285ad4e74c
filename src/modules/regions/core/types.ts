/**
 * Domain types for the Regions module.
 *
 * Regions are flat reference data: aggregate codes such as `wld` or `nam` are
 * stored like any other region and are never derived from finer regions.
 */

export interface Region {
  id: number;
  code: string;
  name: string;
  description: string;
}

export interface NewRegion {
  code: string;
  name: string;
  description: string;
}
