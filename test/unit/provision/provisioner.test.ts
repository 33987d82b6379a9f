import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { buildProvisionArgs, runProvisioning } from '../../../src/provision/provisioner.js';
import { ProvisionerConfigSchema } from '../../../src/types/config.js';
import { createLogger } from '../../../src/logger.js';

const logger = createLogger('silent');

describe('buildProvisionArgs', () => {
  it('uses the fixed inventory and playbook by default', () => {
    expect(buildProvisionArgs(ProvisionerConfigSchema.parse({}))).toEqual(['-i', 'inventory/hosts.ini', 'site.yml']);
  });

  it('appends extra arguments after the playbook', () => {
    const config = ProvisionerConfigSchema.parse({
      inventory: 'hosts/prod.ini',
      playbook: 'deploy.yml',
      extra_args: ['--limit', 'web', '--check'],
    });
    expect(buildProvisionArgs(config)).toEqual(['-i', 'hosts/prod.ini', 'deploy.yml', '--limit', 'web', '--check']);
  });
});

describe('runProvisioning', () => {
  it('returns 0 when the provisioner succeeds', async () => {
    const config = ProvisionerConfigSchema.parse({ command: 'true' });
    await expect(runProvisioning(config, logger)).resolves.toBe(0);
  });

  it('returns the provisioner exit status on failure', async () => {
    const config = ProvisionerConfigSchema.parse({ command: 'false' });
    await expect(runProvisioning(config, logger)).resolves.toBe(1);
  });

  it('hands the inventory and playbook to the provisioner', async () => {
    const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'entrypoint-test-'));
    try {
      // stand-in provisioner: exits 0 only when called as `-i inv.ini play.yml --check`
      const stub = path.join(tmpDir, 'fake-playbook');
      await fs.writeFile(
        stub,
        '#!/bin/sh\ntest "$#" = 4 && test "$1" = "-i" && test "$2" = "inv.ini" && test "$3" = "play.yml" && test "$4" = "--check"\n',
        { mode: 0o755 }
      );
      const config = ProvisionerConfigSchema.parse({
        command: stub,
        inventory: 'inv.ini',
        playbook: 'play.yml',
        extra_args: ['--check'],
      });
      await expect(runProvisioning(config, logger)).resolves.toBe(0);
    } finally {
      await fs.rm(tmpDir, { recursive: true });
    }
  });

  it('rejects with COMMAND_NOT_FOUND when the provisioner is missing', async () => {
    const config = ProvisionerConfigSchema.parse({ command: '/no/such/ansible-playbook' });
    await expect(runProvisioning(config, logger)).rejects.toMatchObject({
      code: 'COMMAND_NOT_FOUND',
      exitCode: 127,
    });
  });
});
