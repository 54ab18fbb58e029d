// Multi-subject session metadata: who wears which strap, and what the group is intending.

export type ParticipantRole = 'participant' | 'facilitator' | 'observer';

export type Participant = {
	name: string;
	role: ParticipantRole;
};

export type GroupSessionInfo = {
	sessionName: string;
	intention: string;
	participants: Record<string, Participant>;
};

const ADDRESS_SUFFIX_LENGTH = 5;

export class GroupSession {
	private readonly participants = new Map<string, Participant>();

	constructor(
		public sessionName = '',
		public intention = '',
	) {}

	/**
	 * Assign a name (and role) to a device address. A blank name clears the
	 * assignment.
	 *
	 * @returns false when the name was blank
	 */
	assign(address: string, name: string, role: ParticipantRole = 'participant'): boolean {
		const trimmed = name.trim();
		if (!trimmed) {
			this.unassign(address);
			return false;
		}
		this.participants.set(address, Object.freeze({ name: trimmed, role }));
		return true;
	}

	unassign(address: string): void {
		this.participants.delete(address);
	}

	getParticipant(address: string): Participant | undefined {
		return this.participants.get(address);
	}

	/** Participant name, else the last five characters of the address. */
	displayName(address: string): string {
		return this.participants.get(address)?.name ?? address.slice(-ADDRESS_SUFFIX_LENGTH);
	}

	addressesByRole(role: ParticipantRole): string[] {
		return [...this.participants.entries()].filter(([, p]) => p.role === role).map(([address]) => address);
	}

	get participantCount(): number {
		return this.participants.size;
	}

	toJSON(): GroupSessionInfo {
		return {
			sessionName: this.sessionName,
			intention: this.intention,
			participants: Object.fromEntries(this.participants),
		};
	}
}
