import { describe, it, expect } from 'vitest';
import { DEFAULT_HOME_COUNTRIES } from '../constants/export.js';
import { buildEvent } from '../loader/index.js';
import { scenarioEvent, scenarioExport } from '../test-utils/fixtures.js';
import { registerDefaultTargets, runTarget } from './defaultTargets.js';
import { TargetRegistry, type TargetContext } from './targets.js';

describe('TargetRegistry', () => {
  it('lists targets in registration order', () => {
    const registry = registerDefaultTargets(new TargetRegistry());
    expect(registry.list().map((target) => target.name)).toEqual(['tnletters', 'nametags']);
    expect(registry.get('nametags')?.description).toBe('Nametags of all participants and guests, per part');
    expect(registry.get('missing')).toBeUndefined();
  });

  it('rejects duplicate names', () => {
    const registry = new TargetRegistry().register('lists', 'Lists', () => []);
    expect(() => registry.register('lists', 'Other lists', () => [])).toThrow(
      "Render target 'lists' is already registered"
    );
  });
});

describe('default targets', () => {
  const event = scenarioEvent();
  const registry = registerDefaultTargets(new TargetRegistry());
  const context: TargetContext = { outputDir: 'out', match: null, homeCountries: DEFAULT_HOME_COUNTRIES };

  it('creates one letter per participant', () => {
    const tasks = runTarget(registry, 'tnletters', event, context);
    expect(tasks.map((task) => task.jobName)).toEqual(['tnletter_2', 'tnletter_3', 'tnletter_1']);
    expect(tasks[0]).toEqual({
      templateName: 'tnletter.tex',
      jobName: 'tnletter_2',
      args: { registrationId: 2, address: '' },
      doubleTex: false,
      outputDir: 'out/tnletters',
    });
  });

  it('filters letters by name', () => {
    const tasks = runTarget(registry, 'tnletters', event, { ...context, match: '^Carla ' });
    expect(tasks.map((task) => task.jobName)).toEqual(['tnletter_3']);
  });

  it('prints the country line only for countries outside the home list', () => {
    const document = scenarioExport();
    const registration = document.registrations?.['2'];
    if (!registration) throw new Error('fixture registration 2 missing');
    Object.assign(registration.persona, {
      address: 'Example Street 1',
      postal_code: '12345',
      location: 'Sampletown',
      country: 'Austria',
    });
    const austrianEvent = buildEvent(document);
    const addressOf = (homeCountries: readonly string[]) =>
      runTarget(registry, 'tnletters', austrianEvent, { ...context, match: '^Anna ', homeCountries })[0]?.args[
        'address'
      ];

    expect(addressOf(DEFAULT_HOME_COUNTRIES)).toBe('Example Street 1\n12345 Sampletown\nAustria');
    expect(addressOf(['', 'AT', 'Austria'])).toBe('Example Street 1\n12345 Sampletown');
  });

  it('creates one nametag document per part', () => {
    const tasks = runTarget(registry, 'nametags', event, context);
    expect(tasks).toEqual([
      {
        templateName: 'nametags.tex',
        jobName: 'nametags_H1',
        args: { partId: 1, registrationIds: [2, 3, 1] },
        doubleTex: true,
      },
      {
        templateName: 'nametags.tex',
        jobName: 'nametags_H2',
        args: { partId: 2, registrationIds: [2, 1] },
        doubleTex: true,
      },
    ]);
  });

  it('rejects unknown targets', () => {
    expect(() => runTarget(registry, 'posters', event, context)).toThrow("Unknown render target 'posters'");
  });
});
