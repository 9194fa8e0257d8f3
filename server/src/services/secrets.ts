/**
 * ERP password providers
 *
 * The password is stored encrypted in the settings table; env is the fallback
 * for deployments that never went through the admin settings.
 */

import type { SettingsRepository } from '../db/repositories/types.js';
import { AuthenticationError } from '../utils/errors.js';
import { decrypt, encrypt } from '../utils/encryption.js';
import type { SecretProvider } from './erp/types.js';

/** Settings key holding the encrypted ERP password */
export const ERP_PASSWORD_SETTING_KEY = 'erpPasswordEncrypted';

function missingPassword(): AuthenticationError {
    return new AuthenticationError('invalid-credentials', 'ERP password is not configured');
}

export class EnvSecretProvider implements SecretProvider {
    constructor(private readonly password: string | undefined) {}

    async getErpPassword(): Promise<string> {
        if (!this.password) throw missingPassword();
        return this.password;
    }
}

export class EncryptedSettingSecretProvider implements SecretProvider {
    constructor(
        private readonly settings: SettingsRepository,
        private readonly encryptionKey: string,
        private readonly fallback: SecretProvider | null = null,
    ) {}

    async getErpPassword(): Promise<string> {
        const stored = await this.settings.get(ERP_PASSWORD_SETTING_KEY);
        if (stored === null || stored === '') {
            if (this.fallback) return this.fallback.getErpPassword();
            throw missingPassword();
        }
        return decrypt(stored, this.encryptionKey);
    }

    async storePassword(password: string): Promise<void> {
        await this.settings.set(ERP_PASSWORD_SETTING_KEY, encrypt(password, this.encryptionKey));
    }
}
