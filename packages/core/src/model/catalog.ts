/**
 * Peripheral catalog: the closed set of hardware peripherals this device
 * family exposes, grouped by family. Adapters are selected per family.
 */

export const PERIPHERAL_FAMILIES = ['led', 'bus'] as const;
export type PeripheralFamily = (typeof PERIPHERAL_FAMILIES)[number];

export interface LedPeripheral {
  family: 'led';
  /** Name of the LED under /sys/class/leds */
  sysfsName: string;
  /** Key written to the boot-state file so the mode survives reboots */
  bootKey: string;
}

export interface BusPeripheral {
  family: 'bus';
  /** Board config key holding 1/0 for the bus */
  statusKey: string;
  /** Board config key holding the bus clock, when the bus has one */
  speedKey?: string;
}

export type PeripheralDescriptor = LedPeripheral | BusPeripheral;

export const PERIPHERAL_CATALOG: Readonly<Record<string, PeripheralDescriptor>> = {
  act_led: { family: 'led', sysfsName: 'work', bootKey: 'act_led' },
  spi0: { family: 'bus', statusKey: 'SPI0_M0_STATUS', speedKey: 'SPI0_M0_SPEED' },
  i2c3: { family: 'bus', statusKey: 'I2C3_M1_STATUS', speedKey: 'I2C3_M1_SPEED' },
  uart3: { family: 'bus', statusKey: 'UART3_M1_STATUS' },
  uart4: { family: 'bus', statusKey: 'UART4_M1_STATUS' },
};

export function getPeripheral(name: string): PeripheralDescriptor | undefined {
  return Object.prototype.hasOwnProperty.call(PERIPHERAL_CATALOG, name)
    ? PERIPHERAL_CATALOG[name]
    : undefined;
}

/** Catalog entries of one family, in catalog order. */
export function peripheralsOf<F extends PeripheralFamily>(
  family: F,
): Array<[string, Extract<PeripheralDescriptor, { family: F }>]> {
  const out: Array<[string, Extract<PeripheralDescriptor, { family: F }>]> = [];
  for (const [name, descriptor] of Object.entries(PERIPHERAL_CATALOG)) {
    if (isFamily(descriptor, family)) out.push([name, descriptor]);
  }
  return out;
}

function isFamily<F extends PeripheralFamily>(
  descriptor: PeripheralDescriptor,
  family: F,
): descriptor is Extract<PeripheralDescriptor, { family: F }> {
  return descriptor.family === family;
}
