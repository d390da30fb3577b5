import type { FunctionAttribute, MutabilityKeyword, VisibilityKeyword } from '../model/ast.js';
import type { Mutability, Visibility } from '../model/types.js';
import { DEFAULT_MUTABILITY, DEFAULT_VISIBILITY } from '../model/types.js';

const VISIBILITY: Record<VisibilityKeyword, Visibility> = {
  public: 'Public',
  private: 'Private',
  internal: 'Internal',
  external: 'External',
};

const MUTABILITY: Record<MutabilityKeyword, Mutability> = {
  pure: 'Pure',
  view: 'View',
  payable: 'Payable',
  constant: 'Constant',
};

export interface ResolvedAttributes {
  visibility: Visibility;
  mutability: Mutability;
}

// Left-to-right fold: the last attribute of each category wins.
export function resolveAttributes(attrs: readonly FunctionAttribute[]): ResolvedAttributes {
  let visibility = DEFAULT_VISIBILITY;
  let mutability = DEFAULT_MUTABILITY;
  for (const attr of attrs) {
    switch (attr.kind) {
      case 'Visibility': visibility = VISIBILITY[attr.value]; break;
      case 'Mutability': mutability = MUTABILITY[attr.value]; break;
    }
  }
  return { visibility, mutability };
}
