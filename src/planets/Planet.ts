import { invalidArgumentError } from "../errors";

/**
 * An enumerated type with data and behaviour per constant.
 *
 * The eight static instances are the only ones that can ever exist: the
 * constructor is private and the list of values is frozen.
 */
export class Planet {
  /** Universal gravitational constant (m3 kg-1 s-2) */
  static readonly G = 6.673e-11;

  static readonly MERCURY = new Planet("MERCURY", 0, 3.303e23, 2.4397e6);
  static readonly VENUS = new Planet("VENUS", 1, 4.869e24, 6.0518e6);
  static readonly EARTH = new Planet("EARTH", 2, 5.976e24, 6.37814e6);
  static readonly MARS = new Planet("MARS", 3, 6.421e23, 3.3972e6);
  static readonly JUPITER = new Planet("JUPITER", 4, 1.9e27, 7.1492e7);
  static readonly SATURN = new Planet("SATURN", 5, 5.688e26, 6.0268e7);
  static readonly URANUS = new Planet("URANUS", 6, 8.686e25, 2.5559e7);
  static readonly NEPTUNE = new Planet("NEPTUNE", 7, 1.024e26, 2.4746e7);

  static readonly #values: readonly Planet[] = Object.freeze([
    Planet.MERCURY,
    Planet.VENUS,
    Planet.EARTH,
    Planet.MARS,
    Planet.JUPITER,
    Planet.SATURN,
    Planet.URANUS,
    Planet.NEPTUNE,
  ]);

  private constructor(
    readonly name: string,
    readonly ordinal: number,
    /** kilograms */
    readonly mass: number,
    /** meters */
    readonly radius: number,
  ) {
    Object.freeze(this);
  }

  static values(): readonly Planet[] {
    return Planet.#values;
  }

  static fromName(name: string): Planet {
    const found = Planet.#values.find(
      (planet) => planet.name === name.toUpperCase(),
    );
    if (!found) {
      return invalidArgumentError.throw({
        argument: "planet",
        value: name,
        reason: `expected one of ${Planet.#values.join(", ")}`,
      });
    }
    return found;
  }

  surfaceGravity(): number {
    return (Planet.G * this.mass) / (this.radius * this.radius);
  }

  surfaceWeight(otherMass: number): number {
    return otherMass * this.surfaceGravity();
  }

  toString(): string {
    return this.name;
  }
}
