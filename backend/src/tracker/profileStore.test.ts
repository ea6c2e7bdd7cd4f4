import { describe, expect, it } from 'vitest';
import { ValidationError } from './errors';
import { ProfileStore } from './profileStore';

describe('ProfileStore', () => {
    it('rejects incomplete profiles without storing anything', () => {
        const store = new ProfileStore();

        expect(() => store.save('u1', { weight_kg: 80, height_cm: 184 })).toThrow(ValidationError);
        expect(store.get('u1')).toBeNull();
    });

    it('returns copies so callers cannot edit the stored profile', () => {
        const store = new ProfileStore();
        store.save('u1', {
            weight_kg: 80,
            height_cm: 184,
            age_years: 26,
            activity_minutes_per_day: 45,
            city: 'Moscow'
        });

        const copy = store.get('u1');
        if (!copy) throw new Error('expected a profile');
        copy.weight_kg = 1;

        expect(store.get('u1')?.weight_kg).toBe(80);
    });
});
