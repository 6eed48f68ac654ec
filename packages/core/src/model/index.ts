export {
  DEFAULT_HOSTNAME,
  DEFAULT_COUNTRY_CODE,
  DEFAULT_LED_MODE,
  LED_MODES,
  RawConfigSchema,
} from './schema.js';
export type {
  LedMode,
  WifiNetwork,
  NetworkingConfig,
  ServiceState,
  LedSettings,
  BusSettings,
  PeripheralSettings,
  ConfigModel,
  PartialConfigModel,
  ModelPatch,
} from './schema.js';

export {
  PERIPHERAL_FAMILIES,
  PERIPHERAL_CATALOG,
  getPeripheral,
  peripheralsOf,
} from './catalog.js';
export type {
  PeripheralFamily,
  PeripheralDescriptor,
  LedPeripheral,
  BusPeripheral,
} from './catalog.js';

export {
  decodeModel,
  createModel,
  defaultModel,
  encodeModel,
  encodeNetworking,
  encodeService,
  encodePeripheral,
  mergeModel,
  deepFreeze,
  formatPath,
} from './decode.js';
export type { PlainValue, PlainTable } from './decode.js';

export { validateModel, assertValidModel, getCountryCodes } from './validate.js';
export type { ValidationResult } from './validate.js';

export { diffModels, modelsConverged, NETWORKING_FIELDS } from './diff.js';
export type { FieldDiff, NetworkingField } from './diff.js';
