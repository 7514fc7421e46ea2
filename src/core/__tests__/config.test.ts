import path from 'path';
import {
  loadAzureConfig,
  parseInactiveDays,
  parseTargetSkus,
  resolveOutputDir,
  validateAzureConfig,
} from '../config';
import { ConfigurationError } from '../../utils/errors';

const TENANT_ID = '11111111-2222-3333-4444-555555555555';
const CLIENT_ID = 'aaaaaaaa-bbbb-cccc-dddd-eeeeeeeeeeee';

describe('validateAzureConfig', () => {
  it('accepts well-formed credentials', () => {
    expect(
      validateAzureConfig({ tenantId: TENANT_ID, clientId: CLIENT_ID, clientSecret: 'test-secret' })
    ).toEqual([]);
  });

  it('lists every problem', () => {
    expect(validateAzureConfig({ tenantId: 'contoso', clientId: '', clientSecret: 'short' })).toEqual([
      'Invalid tenant ID format (expected GUID)',
      'Invalid client ID format (expected GUID)',
      'Client secret is required and must be at least 10 characters',
    ]);
  });
});

describe('loadAzureConfig', () => {
  it('reads credentials from the environment', () => {
    const azure = loadAzureConfig({
      ENTRA_TENANT_ID: ` ${TENANT_ID} `,
      ENTRA_CLIENT_ID: CLIENT_ID,
      ENTRA_CLIENT_SECRET: 'test-secret',
    });

    expect(azure).toEqual({ tenantId: TENANT_ID, clientId: CLIENT_ID, clientSecret: 'test-secret' });
  });

  it('throws a ConfigurationError with details', () => {
    let caught: unknown;
    try {
      loadAzureConfig({ ENTRA_TENANT_ID: TENANT_ID, ENTRA_CLIENT_ID: CLIENT_ID });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught instanceof ConfigurationError && caught.details).toEqual([
      'Client secret is required and must be at least 10 characters',
    ]);
  });
});

describe('parseInactiveDays', () => {
  it('defaults to 90', () => {
    expect(parseInactiveDays()).toBe(90);
  });

  it('parses positive whole numbers', () => {
    expect(parseInactiveDays('30')).toBe(30);
  });

  it.each([['0'], ['-5'], ['7.5'], ['soon']])('rejects %p', (value) => {
    expect(() => parseInactiveDays(value)).toThrow(ConfigurationError);
  });
});

describe('parseTargetSkus', () => {
  it('defaults to the E5 SKUs', () => {
    expect(parseTargetSkus()).toEqual(['ENTERPRISEPREMIUM', 'SPE_E5']);
    expect(parseTargetSkus([])).toEqual(['ENTERPRISEPREMIUM', 'SPE_E5']);
  });

  it('splits, upper-cases and de-duplicates names', () => {
    expect(parseTargetSkus(['spe_e5,ENTERPRISEPREMIUM', 'SPE_E5'])).toEqual(['SPE_E5', 'ENTERPRISEPREMIUM']);
  });

  it('rejects a list of blanks', () => {
    expect(() => parseTargetSkus([' , '])).toThrow(ConfigurationError);
  });
});

describe('resolveOutputDir', () => {
  it('prefers the option, then the environment', () => {
    expect(resolveOutputDir('out', {})).toBe(path.resolve('out'));
    expect(resolveOutputDir(undefined, { REPORT_OUTPUT_DIR: 'exports' })).toBe(path.resolve('exports'));
  });
});
