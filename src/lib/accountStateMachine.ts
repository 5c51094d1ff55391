import { ACCOUNT_STATUSES, type AccountStatus } from '../config/accountConfig';

// active -> pending_deletion -> deleted, never backwards
export const ALLOWED_PREDECESSORS: Readonly<Record<AccountStatus, readonly AccountStatus[]>> = {
  [ACCOUNT_STATUSES.ACTIVE]: [],
  [ACCOUNT_STATUSES.PENDING_DELETION]: [ACCOUNT_STATUSES.ACTIVE],
  [ACCOUNT_STATUSES.DELETED]: [ACCOUNT_STATUSES.PENDING_DELETION],
};

export function canTransition(from: AccountStatus, to: AccountStatus): boolean {
  return ALLOWED_PREDECESSORS[to].includes(from);
}

export function isTerminal(status: AccountStatus): boolean {
  return status === ACCOUNT_STATUSES.DELETED;
}
