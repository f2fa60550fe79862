export {
  SimVehicle,
  BLUEPRINTS,
  BLUEPRINT_NAMES,
  isBlueprintName,
  type BlueprintName,
  type VehicleBlueprint,
  type SimVehicleOptions,
} from './sim-vehicle.js';
export {
  SimWorld,
  SpawnError,
  FORMATION_ORIGIN,
  FORMATION_SPACING,
  type SimWorldOptions,
  type FormationSpawn,
} from './sim-world.js';
