export * from './cpu';
export { TrainerSystem } from './emulator/trainer/system';
export type { TrainerOptions } from './emulator/trainer/system';
export { PortRouter } from './emulator/trainer/port-router';
export type { DeviceMapping } from './emulator/trainer/port-router';
export {
  Ppi8255, PPI_PORT_A, PPI_PORT_B, PPI_PORT_C, PPI_CONTROL, PPI_RESET_CONTROL,
} from './emulator/trainer/ppi8255';
export type { PpiPort, PpiOutputCallback } from './emulator/trainer/ppi8255';
