import { ConfigService } from '@nestjs/config';
import type { EnvironmentVariables } from '../../config/env.validation';
import { PasswordHasher } from './password-hasher.service';

describe('PasswordHasher', () => {
  const hasher = new PasswordHasher(
    new ConfigService<EnvironmentVariables, true>({ BCRYPT_SALT_ROUNDS: 4 }),
  );

  it('produces a salted bcrypt hash at the configured cost', async () => {
    const first = await hasher.hash('wonderland');
    const second = await hasher.hash('wonderland');

    expect(first).toMatch(/^\$2b\$04\$/);
    expect(first).not.toBe('wonderland');
    expect(first).not.toBe(second);
  });

  it('verifies the matching password', async () => {
    const hash = await hasher.hash('wonderland');

    await expect(hasher.verify('wonderland', hash)).resolves.toBe(true);
  });

  it('resolves false for a wrong password', async () => {
    const hash = await hasher.hash('wonderland');

    await expect(hasher.verify('looking-glass', hash)).resolves.toBe(false);
  });
});
