import { bytesToHex, hexToBytes } from '@noble/hashes/utils.js';
import type { Instr, OpName, Program } from '../model/bytecode.js';
import { Op } from '../model/bytecode.js';
import { VmError } from '../errors.js';

// EVM numbering, so dumps read naturally next to real bytecode.
export const OPCODE_BYTE: Record<OpName, number> = {
  PUSH_BYTE: 0x60,
  PUSH_WORD: 0x7f,
  POP: 0x50,
  DUP1: 0x80,
  SWAP1: 0x90,
  LOAD: 0x54,
  STORE: 0x55,
  ISZERO: 0x15,
  RETURN: 0xf3,
};

const WORD_BYTES = 32;

const NULLARY: Record<number, () => Instr> = {
  0x50: Op.pop,
  0x80: Op.dup1,
  0x90: Op.swap1,
  0x54: Op.load,
  0x55: Op.store,
  0x15: Op.isZero,
  0xf3: Op.ret,
};

function wordBytes(word: bigint): number[] {
  const out = new Array<number>(WORD_BYTES).fill(0);
  let v = word;
  for (let i = WORD_BYTES - 1; i >= 0 && v > 0n; i--) {
    out[i] = Number(v & 0xffn);
    v >>= 8n;
  }
  return out;
}

export function encodeProgram(program: Program): Uint8Array {
  const out: number[] = [];
  for (const ins of program) {
    out.push(OPCODE_BYTE[ins.op]);
    if (ins.op === 'PUSH_BYTE') out.push(ins.byte);
    else if (ins.op === 'PUSH_WORD') out.push(...wordBytes(ins.word));
  }
  return Uint8Array.from(out);
}

export function decodeProgram(bytes: Uint8Array): Instr[] {
  const out: Instr[] = [];
  let i = 0;
  while (i < bytes.length) {
    const b = bytes[i];
    if (b === OPCODE_BYTE.PUSH_BYTE) {
      if (i + 1 >= bytes.length) throw new VmError('E_BYTECODE', `truncated PUSH1 at ${i}`);
      out.push(Op.pushByte(bytes[i + 1]));
      i += 2;
      continue;
    }
    if (b === OPCODE_BYTE.PUSH_WORD) {
      if (i + WORD_BYTES >= bytes.length) throw new VmError('E_BYTECODE', `truncated PUSH32 at ${i}`);
      let word = 0n;
      for (const byte of bytes.subarray(i + 1, i + 1 + WORD_BYTES)) word = (word << 8n) | BigInt(byte);
      out.push(Op.pushWord(word));
      i += 1 + WORD_BYTES;
      continue;
    }
    const make = NULLARY[b];
    if (!make) throw new VmError('E_BYTECODE', `unknown opcode 0x${b.toString(16).padStart(2, '0')} at ${i}`);
    out.push(make());
    i += 1;
  }
  return out;
}

export function programToHex(program: Program): string {
  return bytesToHex(encodeProgram(program));
}

export function programFromHex(hex: string): Instr[] {
  const clean = hex.startsWith('0x') ? hex.slice(2) : hex;
  let bytes: Uint8Array;
  try {
    bytes = hexToBytes(clean);
  } catch (err) {
    throw new VmError('E_BYTECODE', `invalid hex: ${err instanceof Error ? err.message : String(err)}`);
  }
  return decodeProgram(bytes);
}
