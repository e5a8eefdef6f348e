const RADIANS_PER_REVOLUTION = 2 * Math.PI;
const SECONDS_PER_MINUTE = 60;
const METERS_PER_KILOMETER = 1000;
const METERS_PER_MILE = 1609.344;
const SECONDS_PER_HOUR = 3600;

/**
 * Linear speed. Stored in metres per second; serializes to that number.
 */
export class Velocity {
  static readonly ZERO = new Velocity(0);

  private constructor(private readonly mps: number) {}

  static fromMetersPerSecond(value: number): Velocity {
    return new Velocity(value);
  }

  static fromKilometersPerHour(value: number): Velocity {
    return new Velocity((value * METERS_PER_KILOMETER) / SECONDS_PER_HOUR);
  }

  static fromMilesPerHour(value: number): Velocity {
    return new Velocity((value * METERS_PER_MILE) / SECONDS_PER_HOUR);
  }

  get metersPerSecond(): number {
    return this.mps;
  }

  get kilometersPerHour(): number {
    return (this.mps * SECONDS_PER_HOUR) / METERS_PER_KILOMETER;
  }

  equals(other: Velocity): boolean {
    return this.mps === other.mps;
  }

  toJSON(): number {
    return this.mps;
  }
}

/**
 * Rotation speed (engine, wheels). Stored in radians per second; serializes to that number.
 */
export class AngularVelocity {
  static readonly ZERO = new AngularVelocity(0);

  private constructor(private readonly radPerSec: number) {}

  static fromRadiansPerSecond(value: number): AngularVelocity {
    return new AngularVelocity(value);
  }

  static fromRevolutionsPerMinute(value: number): AngularVelocity {
    return new AngularVelocity((value * RADIANS_PER_REVOLUTION) / SECONDS_PER_MINUTE);
  }

  get radiansPerSecond(): number {
    return this.radPerSec;
  }

  get revolutionsPerMinute(): number {
    return (this.radPerSec * SECONDS_PER_MINUTE) / RADIANS_PER_REVOLUTION;
  }

  equals(other: AngularVelocity): boolean {
    return this.radPerSec === other.radPerSec;
  }

  toJSON(): number {
    return this.radPerSec;
  }
}
