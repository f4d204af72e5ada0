import { describe, it, expect } from 'vitest';
import { formatCommand } from '../../src/exec/runner.js';
import { HelmClient } from '../../src/tools/helm.js';
import { KubectlClient } from '../../src/tools/kubectl.js';
import { FakeRunner } from '../helpers/fake-runner.js';

describe('formatCommand', () => {
  it('quotes words the shell would split', () => {
    expect(formatCommand({ command: 'kubectl', args: ['patch', 'cm/a', '--patch', '{"a": 1}'] })).toBe(
      `kubectl patch cm/a --patch '{"a": 1}'`,
    );
  });
});

describe('HelmClient', () => {
  it('targets the configured kube context on upgrade', async () => {
    const runner = new FakeRunner();
    await new HelmClient(runner, '/opt/helm', 'test-context').upgrade({
      releaseName: 'web',
      chartDir: '/tmp/chart',
      values: { files: [], set: [] },
      dependencyUpdate: true,
      install: true,
      dryRun: false,
      timeoutSeconds: 120,
    });

    expect(runner.lines).toEqual([
      '/opt/helm upgrade web /tmp/chart --install --timeout 120s --dependency-update --kube-context test-context',
    ]);
  });

  it('renders CRDs only when asked to', async () => {
    const runner = new FakeRunner();
    const helm = new HelmClient(runner, 'helm');
    const request = { releaseName: 'web', chartDir: '/tmp/chart', values: { files: [], set: [] } };
    await helm.template(request);
    await helm.template({ ...request, includeCrds: true });

    expect(runner.lines).toEqual(['helm template web /tmp/chart', 'helm template web /tmp/chart --include-crds']);
  });

  it('pulls from an explicit repository', async () => {
    const runner = new FakeRunner();
    await new HelmClient(runner, 'helm').pull({
      reference: 'mysql',
      destination: '/tmp/fetch',
      repo: 'https://charts.example.com',
    });

    expect(runner.lines).toEqual(['helm pull mysql --untar --untardir /tmp/fetch --repo https://charts.example.com']);
  });
});

describe('KubectlClient', () => {
  it('parses list output as JSON', async () => {
    const runner = new FakeRunner(() => '{"items": []}');
    expect(await new KubectlClient(runner, 'kubectl').list('secrets', 'owner=helm')).toEqual({ items: [] });
  });
});
