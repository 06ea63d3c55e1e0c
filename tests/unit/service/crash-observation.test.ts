import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as path from 'path';
import { HomeContext } from '../../../src/core/home-context';
import { ControlPlaneClient } from '../../../src/client/control-plane-client';
import { NetworkError } from '../../../src/errors';
import { isProcessAlive } from '../../../src/service/process-ownership';
import { ProcessSupervisor } from '../../../src/service/process-supervisor';
import { FakeController, waitUntil } from '../../helpers/fake-controller';
import { makeTempHome, removeTempHome, writeFakeBinary } from '../../helpers/fixtures';

describe.skipIf(process.platform === 'win32')('a service killed out of band', () => {
  let home: HomeContext;
  let controller: FakeController;

  beforeEach(async () => {
    home = makeTempHome();
    controller = await new FakeController().start();
  });

  afterEach(() => {
    removeTempHome(home);
  });

  it('is reported crashed by status while its traffic stream runs out of reconnects', async () => {
    const binary = writeFakeBinary(path.join(home.root, 'bin', 'mihomo'));
    const supervisor = new ProcessSupervisor(home, { probeMs: 300, pollIntervalMs: 20 });
    const record = await supervisor.start(binary, path.join(home.configsDir, 'default.yaml'));
    const client = new ControlPlaneClient({
      baseUrl: controller.url,
      secret: 'test-secret',
      reconnect: { maxReconnectAttempts: 2, baseDelayMs: 10, maxDelayMs: 20 },
    });
    const traffic = client.subscribeTraffic();
    await waitUntil(() => controller.clientCount('/traffic') === 1);

    // The controller goes down together with its process
    process.kill(record.pid, 'SIGKILL');
    await controller.stop();
    await waitUntil(() => !isProcessAlive(record.pid));

    await expect(supervisor.status()).resolves.toMatchObject({
      status: 'crashed',
      pid: record.pid,
    });
    await expect(supervisor.status()).resolves.toEqual({ status: 'stopped' });

    const err = await traffic.next().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(NetworkError);
    expect(err).toMatchObject({
      message: expect.stringMatching(/^traffic stream lost after 2 reconnect attempt\(s\)/),
    });
    expect(traffic.connectionCount).toBe(3);
  });
});
