/**
 * Tests for the YAML features descriptor parser.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parseDescriptor, yamlDescriptorParser } from '../../../src/core/descriptor/yaml-descriptor-parser.js';
import { MalformedDescriptorError } from '../../../src/utils/errors.js';

const FULL_DESCRIPTOR = `
name: example-features
repositories:
  - mvn:org.example/other-features/1.0/yml/features
features:
  - name: example
    version: 1.0.0
    description: Example feature
    bundles:
      - mvn:org.example/example-api/1.0
      - location: mvn:org.example/example-impl/1.0
        start-level: 80
    configfiles:
      - location: mvn:org.example/example-config/1.0/cfg
        finalname: etc/example.cfg
      - mvn:org.example/other-config/1.0/cfg
`;

describe('parseDescriptor', () => {
  it('builds a descriptor from YAML', () => {
    const descriptor = parseDescriptor('file:///features.yml', FULL_DESCRIPTOR);

    assert.deepEqual(descriptor, {
      name: 'example-features',
      source: 'file:///features.yml',
      repositories: ['mvn:org.example/other-features/1.0/yml/features'],
      features: [
        {
          name: 'example',
          version: '1.0.0',
          description: 'Example feature',
          bundles: [
            { location: 'mvn:org.example/example-api/1.0' },
            { location: 'mvn:org.example/example-impl/1.0', startLevel: 80 }
          ],
          configFiles: [
            { location: 'mvn:org.example/example-config/1.0/cfg', finalname: 'etc/example.cfg' },
            { location: 'mvn:org.example/other-config/1.0/cfg' }
          ]
        }
      ]
    });
  });

  it('defaults absent lists to empty ones', () => {
    const descriptor = parseDescriptor('memory', 'name: bare\nfeatures:\n  - name: x\n');

    assert.deepEqual(descriptor.repositories, []);
    assert.equal(descriptor.features.length, 1);
    assert.deepEqual(descriptor.features[0].bundles, []);
    assert.deepEqual(descriptor.features[0].configFiles, []);
  });

  it('accepts JSON content', () => {
    const descriptor = parseDescriptor('memory', '{"repositories": ["mvn:g/r/1"], "features": []}');

    assert.equal(descriptor.name, undefined);
    assert.deepEqual(descriptor.repositories, ['mvn:g/r/1']);
  });

  it('does not validate location syntax', () => {
    const descriptor = parseDescriptor('memory', 'repositories:\n  - not-a-location\n');
    assert.deepEqual(descriptor.repositories, ['not-a-location']);
  });

  it('rejects invalid YAML', () => {
    assert.throws(() => parseDescriptor('memory', 'features: [unclosed'), MalformedDescriptorError);
  });

  it('rejects content that is not a mapping', () => {
    assert.throws(() => parseDescriptor('memory', ''), MalformedDescriptorError);
    assert.throws(() => parseDescriptor('memory', '- a\n- b\n'), MalformedDescriptorError);
  });

  it('rejects a repository that is not a string', () => {
    assert.throws(
      () => parseDescriptor('memory', 'repositories:\n  - location: mvn:g/r/1\n'),
      /repositories\[0\] must be a location string/
    );
  });

  it('rejects a feature without a name', () => {
    assert.throws(
      () => parseDescriptor('memory', 'features:\n  - bundles: [mvn:g/a/1]\n'),
      /features\[0\] must have a name/
    );
  });

  it('rejects a bundle entry without a location', () => {
    assert.throws(
      () => parseDescriptor('memory', 'features:\n  - name: x\n    bundles:\n      - start-level: 10\n'),
      MalformedDescriptorError
    );
  });

  it('rejects a list field given as a scalar', () => {
    assert.throws(() => parseDescriptor('memory', 'repositories: mvn:g/r/1\n'), /descriptor\.repositories must be a list/);
  });

  it('names the source in the error', () => {
    try {
      parseDescriptor('file:///broken.yml', '42');
      assert.fail('Should have thrown error');
    } catch (error) {
      assert(error instanceof MalformedDescriptorError);
      assert.equal(error.message, 'Invalid descriptor file:///broken.yml: content must be a mapping');
    }
  });
});

describe('yamlDescriptorParser', () => {
  it('implements the parser port with parseDescriptor', () => {
    assert.equal(yamlDescriptorParser.parse('memory', 'name: n\n').name, 'n');
  });
});
