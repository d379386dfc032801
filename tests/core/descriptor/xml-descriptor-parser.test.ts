/**
 * Tests for the Karaf features XML parser.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parseXmlDescriptor, xmlDescriptorParser } from '../../../src/core/descriptor/xml-descriptor-parser.js';
import { MalformedDescriptorError } from '../../../src/utils/errors.js';

const FULL_DESCRIPTOR = `<?xml version="1.0" encoding="UTF-8"?>
<features name="example-features" xmlns="http://karaf.apache.org/xmlns/features/v1.4.0">
  <!-- repositories first -->
  <repository>mvn:org.example/other-features/1.0/xml/features</repository>
  <repository>
    mvn:org.example/more-features/2.0/xml/features
  </repository>
  <feature name="example" version="1.0.0" description="Example feature">
    <feature version="[1,2)">other</feature>
    <bundle>mvn:org.example/example-api/1.0</bundle>
    <bundle start-level="80">mvn:org.example/example-impl/1.0</bundle>
    <configfile finalname="etc/example.cfg">mvn:org.example/example-config/1.0/cfg</configfile>
  </feature>
  <feature name="bare"/>
</features>
`;

describe('parseXmlDescriptor', () => {
  it('builds a descriptor from features XML', () => {
    const descriptor = parseXmlDescriptor('file:///features.xml', FULL_DESCRIPTOR);

    assert.deepEqual(descriptor, {
      name: 'example-features',
      source: 'file:///features.xml',
      repositories: [
        'mvn:org.example/other-features/1.0/xml/features',
        'mvn:org.example/more-features/2.0/xml/features'
      ],
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
            { location: 'mvn:org.example/example-config/1.0/cfg', finalname: 'etc/example.cfg' }
          ]
        },
        {
          name: 'bare',
          version: undefined,
          description: undefined,
          bundles: [],
          configFiles: []
        }
      ]
    });
  });

  it('reads a single repository and feature as lists', () => {
    const descriptor = parseXmlDescriptor(
      'memory.xml',
      '<features><repository>mvn:g/r/1</repository><feature name="only"><bundle>mvn:g/a/1</bundle></feature></features>'
    );

    assert.deepEqual(descriptor.repositories, ['mvn:g/r/1']);
    assert.deepEqual(descriptor.features.map(feature => feature.name), ['only']);
    assert.deepEqual(descriptor.features[0].bundles, [{ location: 'mvn:g/a/1' }]);
  });

  it('decodes entities in locations', () => {
    const descriptor = parseXmlDescriptor(
      'memory.xml',
      '<features><feature name="x"><bundle>wrap:mvn:g/a/1.0$Bundle-SymbolicName=a&amp;Bundle-Version=1</bundle></feature></features>'
    );

    assert.deepEqual(descriptor.features[0].bundles, [
      { location: 'wrap:mvn:g/a/1.0$Bundle-SymbolicName=a&Bundle-Version=1' }
    ]);
  });

  it('accepts namespace-prefixed elements', () => {
    const descriptor = parseXmlDescriptor(
      'memory.xml',
      '<f:features xmlns:f="http://karaf.apache.org/xmlns/features/v1.4.0"><f:repository>mvn:g/r/1</f:repository></f:features>'
    );

    assert.deepEqual(descriptor.repositories, ['mvn:g/r/1']);
  });

  it('reads an empty features element', () => {
    assert.deepEqual(parseXmlDescriptor('memory.xml', '<features name="empty"/>'), {
      name: 'empty',
      source: 'memory.xml',
      repositories: [],
      features: []
    });
    assert.deepEqual(parseXmlDescriptor('memory.xml', '<features/>').repositories, []);
  });

  it('rejects text that is not well-formed XML', () => {
    assert.throws(
      () => parseXmlDescriptor('memory.xml', '<features><repository>mvn:g/r/1</features>'),
      MalformedDescriptorError
    );
  });

  it('rejects a document whose root is not features', () => {
    try {
      parseXmlDescriptor('file:///pom.xml', '<project><repository>mvn:g/r/1</repository></project>');
      assert.fail('Should have thrown error');
    } catch (error) {
      assert(error instanceof MalformedDescriptorError);
      assert.equal(error.message, 'Invalid descriptor file:///pom.xml: root element must be <features>');
    }
  });

  it('rejects a feature without a name', () => {
    assert.throws(
      () => parseXmlDescriptor('memory.xml', '<features><feature><bundle>mvn:g/a/1</bundle></feature></features>'),
      /feature\[0\] must have a name attribute/
    );
  });

  it('rejects an empty repository', () => {
    assert.throws(
      () => parseXmlDescriptor('memory.xml', '<features><repository></repository></features>'),
      /repository\[0\] must contain a location/
    );
  });

  it('rejects a start level that is not an integer', () => {
    assert.throws(
      () => parseXmlDescriptor(
        'memory.xml',
        '<features><feature name="x"><bundle start-level="high">mvn:g/a/1</bundle></feature></features>'
      ),
      /feature\[0\]\.bundle\[0\] start-level must be an integer/
    );
  });
});

describe('xmlDescriptorParser', () => {
  it('implements the parser port with parseXmlDescriptor', () => {
    assert.equal(xmlDescriptorParser.parse('memory.xml', '<features name="n"/>').name, 'n');
  });
});
