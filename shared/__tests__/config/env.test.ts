import { requireEnv, envString, envInt, envFloat, envBool, envOptional, ConfigurationError } from '../../src/config/env';

describe('env helpers', () => {
    const env = {
        NAME: 'cookbook',
        BLANK: '   ',
        PORT: '7071',
        BAD_INT: '12.5',
        RATIO: '0.25',
        FLAG: 'Yes',
        BAD_FLAG: 'maybe',
    };

    it('should require set values', () => {
        expect(requireEnv('NAME', env)).toBe('cookbook');
        expect(() => requireEnv('MISSING', env)).toThrow(ConfigurationError);
        expect(() => requireEnv('BLANK', env)).toThrow('BLANK environment variable is not set');
    });

    it('should fall back to defaults for unset or blank values', () => {
        expect(envString('BLANK', 'fallback', env)).toBe('fallback');
        expect(envString('NAME', 'fallback', env)).toBe('cookbook');
        expect(envOptional('MISSING', env)).toBeUndefined();
    });

    it('should parse numbers', () => {
        expect(envInt('PORT', 80, env)).toBe(7071);
        expect(envInt('MISSING', 80, env)).toBe(80);
        expect(() => envInt('BAD_INT', 80, env)).toThrow('BAD_INT must be an integer, got "12.5"');
        expect(envFloat('RATIO', 1, env)).toBe(0.25);
    });

    it('should parse booleans', () => {
        expect(envBool('FLAG', false, env)).toBe(true);
        expect(envBool('MISSING', true, env)).toBe(true);
        expect(() => envBool('BAD_FLAG', false, env)).toThrow('BAD_FLAG must be true or false, got "maybe"');
    });
});
