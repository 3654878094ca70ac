import { createCipheriv, createDecipheriv, randomBytes, scryptSync } from 'crypto';
import { dirname } from 'path';
import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { getLogger } from '@screenlingo/logger';
import { CredentialStoreError } from '../errors';

const logger = getLogger();

const KEY_LENGTH = 32;
const SALT = Buffer.from('screenlingo-credentials-v1', 'utf-8');

export interface KeyStorageOptions {
  /** Segredo mestre (ex.: SCREENLINGO_MASTER_KEY); a chave é derivada com scrypt */
  secret?: string;
  /** Arquivo com a chave em hex; criado com modo 0600 se não existir */
  keyPath?: string;
}

/**
 * Criptografia AES-256-GCM para credenciais
 */
export class KeyStorage {
  private encryptionKey: Buffer;

  constructor(options: KeyStorageOptions) {
    if (options.secret) {
      this.encryptionKey = scryptSync(options.secret, SALT, KEY_LENGTH);
    } else if (options.keyPath) {
      this.encryptionKey = this.loadOrCreateKey(options.keyPath);
    } else {
      throw new CredentialStoreError('KeyStorage needs a secret or a key file path');
    }
  }

  /**
   * Carrega a chave do arquivo ou gera uma nova
   */
  private loadOrCreateKey(keyPath: string): Buffer {
    if (existsSync(keyPath)) {
      const key = Buffer.from(readFileSync(keyPath, 'utf-8').trim(), 'hex');
      if (key.length !== KEY_LENGTH) {
        throw new CredentialStoreError(`Encryption key at ${keyPath} is invalid`);
      }
      return key;
    }

    const key = randomBytes(KEY_LENGTH);
    mkdirSync(dirname(keyPath), { recursive: true });
    writeFileSync(keyPath, key.toString('hex'), { mode: 0o600 });
    logger.info({ keyPath }, 'Generated new credential encryption key');
    return key;
  }

  /**
   * Criptografa um texto
   */
  encrypt(plaintext: string): string {
    const iv = randomBytes(12); // 96 bits para GCM
    const cipher = createCipheriv('aes-256-gcm', this.encryptionKey, iv);

    let encrypted = cipher.update(plaintext, 'utf-8', 'hex');
    encrypted += cipher.final('hex');

    const authTag = cipher.getAuthTag();

    // Formato: iv:authTag:encrypted
    return `${iv.toString('hex')}:${authTag.toString('hex')}:${encrypted}`;
  }

  /**
   * Descriptografa um texto
   */
  decrypt(ciphertext: string): string {
    const parts = ciphertext.split(':');
    if (parts.length !== 3) {
      throw new CredentialStoreError('Invalid ciphertext format');
    }

    const [ivHex, authTagHex, encrypted] = parts;
    try {
      const decipher = createDecipheriv('aes-256-gcm', this.encryptionKey, Buffer.from(ivHex, 'hex'));
      decipher.setAuthTag(Buffer.from(authTagHex, 'hex'));

      let decrypted = decipher.update(encrypted, 'hex', 'utf-8');
      decrypted += decipher.final('utf-8');
      return decrypted;
    } catch (error) {
      throw new CredentialStoreError('Could not decrypt credentials (wrong key?)', { cause: error });
    }
  }
}
