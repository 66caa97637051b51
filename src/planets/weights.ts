import { invalidArgumentError } from "../errors";
import { Planet } from "./Planet";

export type PlanetWeight = {
  planet: Planet;
  weight: number;
};

/**
 * Converts a weight measured on Earth into the weight on every planet.
 */
export function planetWeights(earthWeight: number): PlanetWeight[] {
  if (!Number.isFinite(earthWeight) || earthWeight < 0) {
    return invalidArgumentError.throw({
      argument: "earth weight",
      value: String(earthWeight),
      reason: "expected a non-negative number",
    });
  }
  const mass = earthWeight / Planet.EARTH.surfaceGravity();
  return Planet.values().map((planet) => ({
    planet,
    weight: planet.surfaceWeight(mass),
  }));
}

export function formatPlanetWeight({ planet, weight }: PlanetWeight): string {
  return `Your weight on ${planet} is ${weight.toFixed(6)}`;
}
