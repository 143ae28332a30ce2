/**
 * Owned holder for the cached (token, expiresAt) pair.
 *
 * The pair is only ever read or replaced as one frozen object, so a reader
 * can never see the token of one login next to the expiry of another.
 */

export type SessionToken = Readonly<{
	token: string;
	/** Epoch milliseconds (UTC). */
	expiresAt: number;
}>;

export interface TokenSnapshotStore {
	snapshot(): SessionToken | null;
	replace(next: SessionToken | null): void;
}

export class TokenSlot implements TokenSnapshotStore {
	private current: SessionToken | null = null;

	snapshot(): SessionToken | null {
		return this.current;
	}

	replace(next: SessionToken | null): void {
		this.current = next ? Object.freeze({ token: next.token, expiresAt: next.expiresAt }) : null;
	}
}
