/**
 * DRIVER REGISTRY
 * ===============
 *
 * Flat name -> driver table. The configured device.typeName is looked up
 * here once at startup; adding an instrument model is one register() call.
 */

import { ConfigError } from '../errors';
import { EnergyMeterDriver } from './energy-meter';
import { MultiInverterStationDriver } from './multi-inverter-station';
import { RegisterDumpDriver } from './register-dump';
import { TemperatureLoggerDriver } from './temperature-logger';
import type { DeviceDriver } from './types';
import { WeatherStationDriver } from './weather-station';

export class DriverRegistry {
  private readonly drivers = new Map<string, DeviceDriver>();

  register(typeName: string, driver: DeviceDriver): this {
    if (this.drivers.has(typeName)) {
      throw new ConfigError(`Device type already registered: ${typeName}`);
    }
    this.drivers.set(typeName, driver);
    return this;
  }

  /**
   * @throws ConfigError if no driver is registered under typeName
   */
  resolve(typeName: string): DeviceDriver {
    const driver = this.drivers.get(typeName);
    if (!driver) {
      throw new ConfigError(
        `Unknown device type: ${typeName} (available: ${this.typeNames().join(', ')})`
      );
    }
    return driver;
  }

  has(typeName: string): boolean {
    return this.drivers.has(typeName);
  }

  typeNames(): string[] {
    return Array.from(this.drivers.keys());
  }
}

export function createDefaultRegistry(): DriverRegistry {
  const drivers: DeviceDriver[] = [
    new EnergyMeterDriver(),
    new TemperatureLoggerDriver(),
    new MultiInverterStationDriver(),
    new WeatherStationDriver(),
    new RegisterDumpDriver(),
  ];

  const registry = new DriverRegistry();
  for (const driver of drivers) {
    registry.register(driver.typeName, driver);
  }
  return registry;
}
