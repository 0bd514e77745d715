import { POLICY_REGISTRY, getPolicy, supportedDialects } from '../src/policy-registry';

describe('policy registry', () => {
  it('lists every supported dialect', () => {
    expect(supportedDialects().map(d => `${d.format} ${d.version}`)).toEqual([
      'CycloneDX 1.3', 'CycloneDX 1.4', 'CycloneDX 1.5', 'CycloneDX 1.6',
      'SPDX 2.2', 'SPDX 2.3', 'SPDX 3.0.0', 'SPDX 3.0.1'
    ]);
    expect(supportedDialects('SPDX').map(d => d.version)).toEqual(['2.2', '2.3', '3.0.0', '3.0.1']);
  });

  it('never falls back to a neighbouring version', () => {
    expect(getPolicy('CycloneDX', '1.7')).toBeUndefined();
    expect(getPolicy('CycloneDX', '1.2')).toBeUndefined();
    expect(getPolicy('CycloneDX', '1.5.0')).toBeUndefined();
    expect(getPolicy('SPDX', '2.1')).toBeUndefined();
    expect(getPolicy('SPDX', '1.4')).toBeUndefined();
  });

  it('gates schema uri, tools and supplier shapes by CycloneDX version', () => {
    const shapes = ['1.3', '1.4', '1.5', '1.6'].map(v => {
      const p = getPolicy('CycloneDX', v);
      return p?.format === 'CycloneDX' ? [p.schemaUriRequired, p.toolsShape, p.supplierShape, p.componentVersionRequired] : undefined;
    });
    expect(shapes).toEqual([
      [false, 'flat-list', 'string', true],
      [true, 'flat-list', 'object', false],
      [true, 'components-wrapper', 'object', false],
      [true, 'components-wrapper', 'object', false]
    ]);
  });

  it('requires a callstack module in exactly one dialect', () => {
    const requiring = POLICY_REGISTRY.filter(p => p.format === 'CycloneDX' && p.evidenceCallstackRequiresModule);
    expect(requiring.map(p => p.version)).toEqual(['1.5']);
  });

  it('pins the schema uri value per version', () => {
    const p = getPolicy('CycloneDX', '1.6');
    expect(p?.format === 'CycloneDX' ? p.schemaUriValue : undefined).toBe('http://cyclonedx.org/schema/bom-1.6.schema.json');
  });

  it('is frozen', () => {
    expect(Object.isFrozen(POLICY_REGISTRY)).toBe(true);
  });
});
