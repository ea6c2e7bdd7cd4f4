import { ValidationError } from './errors';
import { profileSchema, type Profile, type UserId } from './types';

/**
 * Holds one validated profile per user. Profiles are replaced wholesale; there is no field-level update.
 */
export class ProfileStore {
    private readonly profiles = new Map<UserId, Profile>();

    get(userId: UserId): Profile | null {
        const profile = this.profiles.get(userId);
        return profile ? { ...profile } : null;
    }

    /**
     * Validate and store a complete profile, replacing any previous one for the user.
     * Nothing is written when validation fails.
     */
    save(userId: UserId, input: unknown): Profile {
        const parsed = profileSchema.safeParse(input);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            const field = issue?.path.join('.');
            throw new ValidationError(issue ? `Invalid profile: ${field} ${issue.message}` : 'Invalid profile', field);
        }

        this.profiles.set(userId, parsed.data);
        return { ...parsed.data };
    }
}
