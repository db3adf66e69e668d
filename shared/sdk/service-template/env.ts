// Environment helpers. Every setting has a documented default so a service
// boots with nothing but a `.env` pointing at its collaborators.

export const env = (name: string, fallback: string): string => {
    const value = process.env[name];
    return value === undefined || value.trim() === '' ? fallback : value.trim();
};

export const optionalEnv = (name: string): string | undefined => {
    const value = process.env[name];
    return value === undefined || value.trim() === '' ? undefined : value.trim();
};

export const envInt = (name: string, fallback: number): number => {
    const raw = optionalEnv(name);
    if (raw === undefined) return fallback;

    const parsed = parseInt(raw, 10);
    if (Number.isNaN(parsed)) {
        throw new Error(`Environment variable ${name} must be an integer, got "${raw}"`);
    }
    return parsed;
};
