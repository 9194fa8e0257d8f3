import crypto from 'crypto';

const ALGORITHM = 'aes-256-gcm' as const;
const IV_LENGTH = 16;
const TAG_LENGTH = 16;

/**
 * Derive a 32-byte key from an arbitrary secret using SHA-256
 */
function deriveKey(secret: string): Buffer {
    if (!secret) {
        throw new Error('An encryption secret is required');
    }
    return crypto.createHash('sha256').update(secret).digest();
}

/**
 * Encrypt a string value
 * @returns Base64 of IV + ciphertext + auth tag
 */
export function encrypt(plaintext: string, secret: string): string {
    const key = deriveKey(secret);
    const iv = crypto.randomBytes(IV_LENGTH);
    const cipher = crypto.createCipheriv(ALGORITHM, key, iv);

    const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
    const authTag = cipher.getAuthTag();

    return Buffer.concat([iv, encrypted, authTag]).toString('base64');
}

/**
 * Decrypt a value produced by `encrypt`. Throws when the secret does not
 * match or the value was tampered with.
 */
export function decrypt(encryptedValue: string, secret: string): string {
    if (!isEncrypted(encryptedValue)) {
        throw new Error('Value is not in encrypted format');
    }

    const key = deriveKey(secret);
    const combined = Buffer.from(encryptedValue, 'base64');

    const iv = combined.subarray(0, IV_LENGTH);
    const authTag = combined.subarray(combined.length - TAG_LENGTH);
    const encrypted = combined.subarray(IV_LENGTH, combined.length - TAG_LENGTH);

    const decipher = crypto.createDecipheriv(ALGORITHM, key, iv);
    decipher.setAuthTag(authTag);

    try {
        return Buffer.concat([decipher.update(encrypted), decipher.final()]).toString('utf8');
    } catch (error: unknown) {
        throw new Error('Failed to decrypt stored value - the encryption secret may have changed', { cause: error });
    }
}

/**
 * Check if a value appears to be encrypted (base64 with at least IV + tag bytes)
 */
export function isEncrypted(value: string | null | undefined): boolean {
    if (!value) return false;
    const decoded = Buffer.from(value, 'base64');
    return decoded.length > IV_LENGTH + TAG_LENGTH;
}
