export { Cpu } from './cpu';
export type { TraceEntry, TraceCallback, RunOutcome, RunResult, FlagName } from './cpu';
export { FlatMemory } from './memory';
export { RegisterFile } from './registers';
export { Z80_ARCH, I8085_ARCH, getArchitecture } from './architectures';
export type { Architecture } from './architectures';
export { decode, validateEntry } from './decoder';
export { DecodeError } from './errors';
export type { DecodeErrorReason } from './errors';
export { formatInstruction, formatBytes } from './disasm';
export type { Instruction, OpcodeEntry, OpcodeTable, Operand, OperationKind, Condition } from './instruction';
export { NullIOBus } from './types';
export type {
  Memory, IOBus, ArchitectureId, Reg8, Reg16, FlagLayout,
  RegisterState, CpuState, ExecutionState, ProgramImage, ProgramSegment,
} from './types';
export { Z80_OPCODES } from './z80/opcodes';
export { Z80_FLAGS } from './z80/types';
export { I8085_OPCODES } from './i8085/opcodes';
export { I8085_FLAGS } from './i8085/types';
