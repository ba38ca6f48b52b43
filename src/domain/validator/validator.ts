import { z } from 'zod/v4';

/**
 * Ten digit numbers with an optional country code, e.g. 501-555-0101, (501) 555 0101, +1 501.555.0101
 */
export const PHONE_RX = /^(?:\+\d{1,3}[\s.-]?)?(?:\(\d{3}\)|\d{3})[\s.-]?\d{3}[\s.-]?\d{4}$/;

const emailSchema = z.email();
const websiteSchema = z.url({ protocol: /^https?$/ });

export type ValidationErrors = Readonly<Record<string, string>>;

/**
 * Accumulates field errors for a single validation pass.
 * The first message recorded for a field wins.
 */
export class Validator {
    private readonly fieldErrors = new Map<string, string>();

    public get errors(): ValidationErrors {
        return Object.fromEntries(this.fieldErrors);
    }

    public addError(key: string, message: string): void {
        if (!this.fieldErrors.has(key)) {
            this.fieldErrors.set(key, message);
        }
    }

    public check(ok: boolean, key: string, message: string): void {
        if (!ok) {
            this.addError(key, message);
        }
    }

    public valid(): boolean {
        return this.fieldErrors.size === 0;
    }
}

export const byteLength = (value: string): number => Buffer.byteLength(value, 'utf8');

export const matches = (value: string, rx: RegExp): boolean => rx.test(value);

export const unique = <T>(values: readonly T[]): boolean => new Set(values).size === values.length;

export const isEmail = (value: string): boolean => emailSchema.safeParse(value).success;

export const isWebsite = (value: string): boolean => websiteSchema.safeParse(value).success;
