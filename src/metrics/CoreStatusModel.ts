import type { CoreModelConfig } from '../config/schema';

/**
 * Simulated hardware status of one core
 */
export interface CoreReading {
  utilization: number;
  frequency: number;
  temperature: number;
  power: number;
}

/**
 * Default model constants
 */
export const DEFAULT_CORE_MODEL: CoreModelConfig = {
  window: 5,
  minFrequency: 1.0,
  maxFrequency: 3.0,
  ambientTemperature: 20,
  maxTemperature: 100,
  decay: 0.7,
  idlePower: 2,
  busyPowerBase: 5,
  busyPowerPerGHz: 10,
};

/**
 * Maps recent load of one core to frequency, temperature and power
 *
 * The only state is a fixed-length window of busy/idle slots, initially idle.
 * Frequency follows plain window utilization; temperature follows a
 * decay-weighted utilization so recent ticks dominate and idle ticks cool the
 * core down.
 */
export class CoreStatusModel {
  private slots: boolean[];

  constructor(private readonly model: CoreModelConfig = DEFAULT_CORE_MODEL) {
    this.slots = new Array<boolean>(model.window).fill(false);
  }

  /**
   * Push one tick and return the status for that tick
   */
  record(busy: boolean): CoreReading {
    this.slots.shift();
    this.slots.push(busy);
    return this.reading();
  }

  reading(): CoreReading {
    const { model } = this;
    const busySlots = this.slots.filter(Boolean).length;
    const utilization = busySlots / this.slots.length;
    const frequency = model.minFrequency + (model.maxFrequency - model.minFrequency) * utilization;

    let weighted = 0;
    let totalWeight = 0;
    let weight = 1;
    for (let i = this.slots.length - 1; i >= 0; i--) {
      if (this.slots[i]) {
        weighted += weight;
      }
      totalWeight += weight;
      weight *= model.decay;
    }
    const heat = totalWeight > 0 ? weighted / totalWeight : 0;
    const temperature = model.ambientTemperature + (model.maxTemperature - model.ambientTemperature) * heat;

    const latestBusy = this.slots[this.slots.length - 1] ?? false;
    const power = latestBusy ? model.busyPowerBase + model.busyPowerPerGHz * frequency : model.idlePower;

    return { utilization, frequency, temperature, power };
  }
}
