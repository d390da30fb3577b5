import type { OpName } from '../model/bytecode.js';
import type { Mutability } from '../model/types.js';
import type { VmErrorCode } from '../errors.js';

export interface Lowered {
  kind: 'Lowered';
  contract: string;
  signature: string;
  selector: string;
  size: number;
}

export interface Dispatch {
  kind: 'Dispatch';
  contract: string;
  selector: string;
  found: boolean;
}

export interface Step {
  kind: 'Step';
  pc: number;
  op: OpName;
  depth: number;
}

export interface Fault {
  kind: 'Fault';
  code: VmErrorCode;
  msg: string;
  pc?: number;
}

export interface Commit {
  kind: 'Commit';
  selector: string;
  mutability: Mutability;
  committed: boolean;
  before: string;
  after: string;
}

export type TraceTag =
  | Lowered
  | Dispatch
  | Step
  | Fault
  | Commit;
