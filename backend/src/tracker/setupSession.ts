import { NoActiveSessionError, ValidationError } from './errors';
import type { ProfileStore } from './profileStore';
import { SETUP_FIELDS, type SetupFieldDescriptor } from './setupFields';
import type { AwaitingState, Profile, ProfileDraft, SetupFieldName, UserId } from './types';

type SetupSession = {
    fieldIndex: number;
    draft: ProfileDraft;
};

export type AwaitingStep = {
    state: AwaitingState;
    field: SetupFieldName;
    prompt: string;
};

export type CompleteStep = {
    state: 'Complete';
    profile: Profile;
};

export type SetupStep = AwaitingStep | CompleteStep;

const toAwaitingStep = (descriptor: SetupFieldDescriptor): AwaitingStep => ({
    state: descriptor.state,
    field: descriptor.field,
    prompt: descriptor.prompt
});

/**
 * Multi-message profile setup, one session per user.
 *
 * Sessions walk SETUP_FIELDS forward only. Complete and Cancelled are terminal: the session is
 * removed as soon as either is reached, so neither is ever observable through `current`.
 */
export class SetupSessionMachine {
    private readonly sessions = new Map<UserId, SetupSession>();

    constructor(
        private readonly profiles: ProfileStore,
        private readonly fields: readonly SetupFieldDescriptor[] = SETUP_FIELDS
    ) {
        if (fields.length === 0) {
            throw new Error('Profile setup needs at least one field');
        }
    }

    /**
     * Begin (or restart) setup. An unfinished session for the same user is discarded.
     */
    start(userId: UserId): AwaitingStep {
        this.sessions.set(userId, { fieldIndex: 0, draft: {} });
        return toAwaitingStep(this.fields[0]);
    }

    submit(userId: UserId, rawText: string): SetupStep {
        const session = this.sessions.get(userId);
        if (!session) {
            throw new NoActiveSessionError();
        }

        const descriptor = this.fields[session.fieldIndex];
        const value = descriptor.parse(rawText);
        if (value === null) {
            throw new ValidationError(descriptor.invalidMessage, descriptor.field);
        }

        const draft: ProfileDraft = { ...session.draft };
        draft[descriptor.field] = value;
        const nextIndex = session.fieldIndex + 1;
        if (nextIndex < this.fields.length) {
            this.sessions.set(userId, { fieldIndex: nextIndex, draft });
            return toAwaitingStep(this.fields[nextIndex]);
        }

        const profile = this.profiles.save(userId, draft);
        this.sessions.delete(userId);
        return { state: 'Complete', profile };
    }

    /**
     * Drop the user's session. Returns whether one was active; cancelling nothing is not an error.
     */
    cancel(userId: UserId): boolean {
        return this.sessions.delete(userId);
    }

    current(userId: UserId): AwaitingStep {
        const session = this.sessions.get(userId);
        if (!session) {
            throw new NoActiveSessionError();
        }
        return toAwaitingStep(this.fields[session.fieldIndex]);
    }
}
