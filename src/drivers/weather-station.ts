import { requireRegisters, scaledValue, signed16 } from '../decoder/register-decoder';
import type { RawBlock } from '../decoder/register-decoder';
import { singleBlockRead } from './record';
import type { DeviceDescriptor, DeviceDriver, FieldValue, ReadRequest } from './types';

interface WeatherChannel {
  name: string;
  offset: number;
  divisor: number;
  signed: boolean;
}

const CHANNELS: readonly WeatherChannel[] = [
  { name: 'irradianceWm2', offset: 0, divisor: 1, signed: false },
  { name: 'windSpeedMs', offset: 1, divisor: 10, signed: false },
  { name: 'windDirectionDeg', offset: 2, divisor: 1, signed: false },
  { name: 'ambientTempC', offset: 3, divisor: 10, signed: true },
  { name: 'humidityPct', offset: 4, divisor: 10, signed: false },
  { name: 'pressureHPa', offset: 5, divisor: 10, signed: false },
  { name: 'moduleTempC', offset: 6, divisor: 10, signed: true },
];

const FIELD_NAMES = CHANNELS.map((channel) => channel.name);
const REQUIRED_REGISTERS = Math.max(...CHANNELS.map((channel) => channel.offset)) + 1;

export class WeatherStationDriver implements DeviceDriver {
  readonly typeName = 'weather-station';
  readonly description = 'Weather station: irradiance, wind, temperature, humidity, pressure';
  readonly escalation = 'soft-fail' as const;

  minRegisters(): number {
    return REQUIRED_REGISTERS;
  }

  fieldNames(): readonly string[] {
    return FIELD_NAMES;
  }

  planRead(descriptor: DeviceDescriptor, unitId: number): ReadRequest {
    return singleBlockRead(descriptor, unitId);
  }

  decode(block: RawBlock): FieldValue[] {
    requireRegisters(block, REQUIRED_REGISTERS, this.typeName);
    return CHANNELS.map((channel) => {
      const raw = channel.signed ? signed16(block[channel.offset]) : block[channel.offset];
      return channel.divisor === 1 ? raw : scaledValue(raw, channel.divisor, 1);
    });
  }
}
