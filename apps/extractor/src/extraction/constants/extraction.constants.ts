import type { PanHolderType } from '@pancard/shared-types';
import holderTypes from '../data/holder-types.json';
import headerDenylist from '../data/header-denylist.json';

export const PAN_TOKEN_PATTERN = /[A-Z]{5}[0-9]{4}[A-Z]/g;
export const PAN_HOLDER_TYPE_INDEX = 3;

export const ANCHOR_TOKENS = ['INCOME', 'TAX'] as const;

export const NAME_CANDIDATE_MIN_LENGTH = 4;
export const NAME_CANDIDATE_MAX_LENGTH = 40;
export const NAME_CANDIDATE_MIN_TOKENS = 2;

export const DEFAULT_HOLDER_TYPES: readonly PanHolderType[] = Object.entries(holderTypes).map(
  ([code, description]) => ({ code, description }),
);
export const DEFAULT_HEADER_DENYLIST: readonly string[] = headerDenylist;
