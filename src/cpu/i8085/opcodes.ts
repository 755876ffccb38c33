/**
 * Intel 8085 opcode table
 *
 * Single page, no prefixes. The eight register fields are
 * B C D E H L M A, where M is the byte addressed by HL. Slots left
 * undefined (08 10 18 28 38 CB D9 DD ED FD) are illegal encodings.
 */

import type { Reg16 } from '@/cpu/types';
import type { Operand, OpcodePage, OpcodeTable, OperationKind } from '@/cpu/instruction';
import {
  buildPage, reg, pair, ind, imm8, imm16, dir8, dir16, port,
  REGISTER_FIELD, CONDITION_FIELD, type RegisterField,
} from '@/cpu/opcode-table';

function field(r: RegisterField): Operand {
  return r === 'm' ? ind('hl') : reg(r);
}

function fieldName(r: RegisterField): string {
  return r.toUpperCase();
}

// Register pairs as named by LXI/DAD/INX/DCX (rp) and PUSH/POP (rp with PSW)
const RP: readonly [Reg16, string][] = [['bc', 'B'], ['de', 'D'], ['hl', 'H'], ['sp', 'SP']];
const RP_STACK: readonly [Reg16, string][] = [['bc', 'B'], ['de', 'D'], ['hl', 'H'], ['af', 'PSW']];

const ALU_OPS: readonly [OperationKind, string, string][] = [
  ['add', 'ADD', 'ADI'],
  ['addWithCarry', 'ADC', 'ACI'],
  ['subtract', 'SUB', 'SUI'],
  ['subtractWithBorrow', 'SBB', 'SBI'],
  ['and', 'ANA', 'ANI'],
  ['xor', 'XRA', 'XRI'],
  ['or', 'ORA', 'ORI'],
  ['compare', 'CMP', 'CPI'],
];

const A = reg('a');
const HL = pair('hl');

const main = buildPage(0, (set) => {
  set(0x00, 'NOP', 'nop');

  // --- 16-bit loads and arithmetic ---
  RP.forEach(([rp, name], i) => {
    const base = i << 4;
    set(0x01 | base, `LXI ${name},nn`, 'move', [pair(rp), imm16]);
    set(0x03 | base, `INX ${name}`, 'increment16', [pair(rp)]);
    set(0x09 | base, `DAD ${name}`, 'add16', [HL, pair(rp)]);
    set(0x0b | base, `DCX ${name}`, 'decrement16', [pair(rp)]);
  });

  set(0x02, 'STAX B', 'move', [ind('bc'), A]);
  set(0x12, 'STAX D', 'move', [ind('de'), A]);
  set(0x0a, 'LDAX B', 'move', [A, ind('bc')]);
  set(0x1a, 'LDAX D', 'move', [A, ind('de')]);
  set(0x22, 'SHLD nn', 'move', [dir16, HL]);
  set(0x2a, 'LHLD nn', 'move', [HL, dir16]);
  set(0x32, 'STA nn', 'move', [dir8, A]);
  set(0x3a, 'LDA nn', 'move', [A, dir8]);

  // --- INR / DCR / MVI ---
  REGISTER_FIELD.forEach((r, i) => {
    const base = i << 3;
    set(0x04 | base, `INR ${fieldName(r)}`, 'increment', [field(r)]);
    set(0x05 | base, `DCR ${fieldName(r)}`, 'decrement', [field(r)]);
    set(0x06 | base, `MVI ${fieldName(r)},n`, 'move', [field(r), imm8]);
  });

  // --- Accumulator rotates and flag ops ---
  set(0x07, 'RLC', 'rotateAccumulator', [], { shift: 'rlc' });
  set(0x0f, 'RRC', 'rotateAccumulator', [], { shift: 'rrc' });
  set(0x17, 'RAL', 'rotateAccumulator', [], { shift: 'rl' });
  set(0x1f, 'RAR', 'rotateAccumulator', [], { shift: 'rr' });
  set(0x27, 'DAA', 'decimalAdjust');
  set(0x2f, 'CMA', 'complement');
  set(0x37, 'STC', 'setCarry');
  set(0x3f, 'CMC', 'complementCarry');

  set(0x20, 'RIM', 'readInterruptMask');
  set(0x30, 'SIM', 'setInterruptMask');

  // --- MOV (0x76 would be MOV M,M and is HLT instead) ---
  REGISTER_FIELD.forEach((dst, d) => {
    REGISTER_FIELD.forEach((src, s) => {
      const op = 0x40 | (d << 3) | s;
      if (op === 0x76) return;
      set(op, `MOV ${fieldName(dst)},${fieldName(src)}`, 'move', [field(dst), field(src)]);
    });
  });
  set(0x76, 'HLT', 'halt');

  // --- ALU register and immediate forms ---
  ALU_OPS.forEach(([kind, regName, immName], i) => {
    REGISTER_FIELD.forEach((src, s) => {
      set(0x80 | (i << 3) | s, `${regName} ${fieldName(src)}`, kind, [A, field(src)]);
    });
    set(0xc6 | (i << 3), `${immName} n`, kind, [A, imm8]);
  });

  // --- Control flow ---
  CONDITION_FIELD.forEach((condition, i) => {
    const cc = condition.toUpperCase();
    const base = i << 3;
    set(0xc0 | base, `R${cc}`, 'return', [], { condition });
    set(0xc2 | base, `J${cc} nn`, 'jump', [imm16], { condition });
    set(0xc4 | base, `C${cc} nn`, 'call', [imm16], { condition });
    set(0xc7 | base, `RST ${i}`, 'restart', [], { vector: base });
  });
  set(0xc3, 'JMP nn', 'jump', [imm16]);
  set(0xc9, 'RET', 'return');
  set(0xcd, 'CALL nn', 'call', [imm16]);
  set(0xe9, 'PCHL', 'jump', [HL]);

  // --- Stack ---
  RP_STACK.forEach(([rp, name], i) => {
    set(0xc1 | (i << 4), `POP ${name}`, 'pop', [pair(rp)]);
    set(0xc5 | (i << 4), `PUSH ${name}`, 'push', [pair(rp)]);
  });
  set(0xe3, 'XTHL', 'exchange', [ind('sp', 16), HL]);
  set(0xeb, 'XCHG', 'exchange', [pair('de'), HL]);
  set(0xf9, 'SPHL', 'move', [pair('sp'), HL]);

  // --- I/O and interrupts ---
  set(0xd3, 'OUT n', 'portOut', [port, A]);
  set(0xdb, 'IN n', 'portIn', [A, port]);
  set(0xf3, 'DI', 'disableInterrupts');
  set(0xfb, 'EI', 'enableInterrupts');
});

export const I8085_OPCODES: OpcodeTable = {
  main,
  prefixed: new Map<number, OpcodePage>(),
  indexedBit: new Map<number, OpcodePage>(),
};
