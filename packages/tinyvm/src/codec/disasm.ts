import type { Instr, Program } from '../model/bytecode.js';

const hex = (n: number | bigint, width: number) => '0x' + n.toString(16).padStart(width, '0');

export function formatInstr(ins: Instr): string {
  switch (ins.op) {
    case 'PUSH_BYTE': return `PUSH1 ${hex(ins.byte, 2)}`;
    case 'PUSH_WORD': return `PUSH32 ${hex(ins.word, 64)}`;
    case 'POP': return 'POP';
    case 'DUP1': return 'DUP1';
    case 'SWAP1': return 'SWAP1';
    case 'LOAD': return 'SLOAD';
    case 'STORE': return 'SSTORE';
    case 'ISZERO': return 'ISZERO';
    case 'RETURN': return 'RETURN';
  }
}

export function formatProgram(program: Program): string {
  return program.map(formatInstr).join('\n');
}
