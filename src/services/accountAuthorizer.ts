import { REQUESTER_ROLES } from '../config/accountConfig';
import type { RequesterRole } from '../config/accountConfig';
import type { RequesterIdentity } from '../types/account';

/**
 * Authorization collaborator of the deletion controller
 */
export interface AccountAuthorizer {
  isAuthorized(requester: RequesterIdentity, accountId: string): Promise<boolean>;
}

export type DeletionPolicy = (requester: RequesterIdentity, accountId: string) => boolean;

export const DELETION_POLICIES: Readonly<Record<RequesterRole, DeletionPolicy>> = {
  // Owners only; the account id is the auth user id
  [REQUESTER_ROLES.USER]: (requester, accountId) => requester.id === accountId,
  [REQUESTER_ROLES.ADMIN]: () => true,
  [REQUESTER_ROLES.SERVICE]: () => true,
};

export class RolePolicyAuthorizer implements AccountAuthorizer {
  constructor(
    private readonly policies: Readonly<Record<RequesterRole, DeletionPolicy>> = DELETION_POLICIES
  ) {}

  async isAuthorized(requester: RequesterIdentity, accountId: string): Promise<boolean> {
    if (!requester.id) {
      return false;
    }
    return this.policies[requester.role](requester, accountId);
  }
}
