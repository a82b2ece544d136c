/**
 * Sensor collaborator contracts. Sensor acquisition lives outside TankView;
 * readers resolve to null instead of rejecting when a reading is unavailable.
 */

export interface SensorReader<T> {
  readonly name: string;
  read(): Promise<T | null>;
}

export interface AirReading {
  temperatureC: number;
  humidityPercent: number;
  pressureHpa: number;
}

export type WaterTemperatureReading = number;

export type WaterLevelReading = boolean;

export type PhReading = number;

export interface SensorSuite {
  air?: SensorReader<AirReading>;
  waterTemperature?: SensorReader<WaterTemperatureReading>;
  waterLevel?: SensorReader<WaterLevelReading>;
  ph?: SensorReader<PhReading>;
}
