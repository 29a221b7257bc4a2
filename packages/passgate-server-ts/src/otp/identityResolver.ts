import type { AccountRef, UserClass } from './types'

export type IdentityResolution = { status: 'no_account' } | { status: 'inactive_account'; account: AccountRef }

/**
 * Decides, at issue time, whether a code belongs to a signup (no account yet)
 * or to an existing account that still has to be activated.
 */
export interface SignupIdentityResolver {
  resolve(email: string, userClass: UserClass): Promise<IdentityResolution>
}

/**
 * Host lookup into its own account table. Return the account only when it
 * should receive an account-bound code; null means signup.
 */
export type AccountLookup = (email: string, userClass: UserClass) => Promise<{ accountId: string } | null>

export const createAccountLookupResolver = (lookup: AccountLookup): SignupIdentityResolver => ({
  resolve: async (email, userClass) => {
    const account = await lookup(email, userClass)
    if (!account) return { status: 'no_account' }
    return { status: 'inactive_account', account: { userClass, accountId: account.accountId } }
  },
})
