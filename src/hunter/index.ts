/**
 * 🕷️ HUNTER MODULE
 *
 * Exports:
 * - MapsHarvester: incremental Google Maps result harvesting
 * - HarvestAccumulator: per-run seen-set and record store
 */

export { MapsHarvester, MapsHarvesterOptions, harvesterOptionsFromConfig } from './maps_harvester';
export { HarvestAccumulator } from './accumulator';
export { waitForSettled } from './settle';
