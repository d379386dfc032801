/**
 * Tests for location → coordinate normalization.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  parseMavenLocation,
  stripVersionQualifier,
  toCoordinate,
  toCoordinates
} from '../../../src/core/coordinates/normalize.js';
import { MalformedLocationError } from '../../../src/utils/errors.js';
import { ErrorCodes } from '../../../src/types/index.js';

describe('toCoordinate', () => {
  it('joins group, artifact and version', () => {
    assert.equal(toCoordinate('mvn:g/a/1.0'), 'g:a:1.0');
  });

  it('keeps type and classifier between artifact and version', () => {
    assert.equal(
      toCoordinate('mvn:org.example/example-features/1.2.0/xml/features'),
      'org.example:example-features:xml:features:1.2.0'
    );
  });

  it('keeps a type without classifier', () => {
    assert.equal(toCoordinate('mvn:org.example/example-config/1.0/cfg'), 'org.example:example-config:cfg:1.0');
  });

  it('gives a classifier without type the jar type', () => {
    assert.equal(toCoordinate('mvn:g/a/1.0//tests'), 'g:a:jar:tests:1.0');
    assert.notEqual(toCoordinate('mvn:g/a/1.0//tests'), toCoordinate('mvn:g/a/1.0/tests'));
  });

  it('strips the wrap transport prefix and the property suffix of the version', () => {
    assert.equal(toCoordinate('wrap:mvn:group/artifact/version$build123'), 'group:artifact:version');
  });

  it('drops wrap instructions following the version', () => {
    assert.equal(
      toCoordinate('wrap:mvn:org.example/legacy/2.0$Bundle-SymbolicName=legacy&Bundle-Version=2.0'),
      'org.example:legacy:2.0'
    );
  });

  it('defaults a missing or blank version to LATEST', () => {
    assert.equal(toCoordinate('mvn:org.example/api'), 'org.example:api:LATEST');
    assert.equal(toCoordinate('mvn:org.example/api//jar'), 'org.example:api:jar:LATEST');
  });

  it('ignores a repository URL given before !', () => {
    assert.equal(toCoordinate('mvn:https://repo.example.org/maven2!org.example/api/2.0'), 'org.example:api:2.0');
  });

  it('is deterministic', () => {
    const location = 'wrap:mvn:org.example/api/1.0$x=y';
    assert.equal(toCoordinate(location), toCoordinate(location));
    assert.equal(toCoordinate(location), 'org.example:api:1.0');
  });

  it('rejects locations without the mvn scheme', () => {
    assert.throws(() => toCoordinate('file:/tmp/api.jar'), MalformedLocationError);
    assert.throws(() => toCoordinate('wrap:file:/tmp/api.jar'), MalformedLocationError);
  });

  it('rejects locations without an artifact', () => {
    assert.throws(() => toCoordinate('mvn:org.example'), MalformedLocationError);
    assert.throws(() => toCoordinate('mvn:org.example//1.0'), MalformedLocationError);
  });

  it('rejects a blank group', () => {
    assert.throws(() => toCoordinate('mvn:/api/1.0'), MalformedLocationError);
  });

  it('rejects a dangling repository separator', () => {
    assert.throws(() => toCoordinate('mvn:!org.example/api/1.0'), MalformedLocationError);
    assert.throws(() => toCoordinate('mvn:org.example/api/1.0!'), MalformedLocationError);
  });

  it('reports the malformed location in the error', () => {
    try {
      toCoordinate('http://example.org/api.jar');
      assert.fail('Should have thrown error');
    } catch (error) {
      assert(error instanceof MalformedLocationError);
      assert.equal(error.code, ErrorCodes.MALFORMED_LOCATION);
      assert.equal(error.details?.location, 'http://example.org/api.jar');
    }
  });
});

describe('parseMavenLocation', () => {
  it('exposes every part of the location', () => {
    assert.deepEqual(parseMavenLocation('mvn:https://repo.example.org!org.example/api/1.0$x/bundle/tests'), {
      repositoryUrl: 'https://repo.example.org',
      group: 'org.example',
      artifact: 'api',
      version: '1.0$x',
      type: 'bundle',
      classifier: 'tests'
    });
  });

  it('fills in the jar type when only a classifier is given', () => {
    assert.deepEqual(parseMavenLocation('mvn:g/a/1.0/ /tests'), {
      repositoryUrl: undefined,
      group: 'g',
      artifact: 'a',
      version: '1.0',
      type: 'jar',
      classifier: 'tests'
    });
  });

  it('leaves absent parts undefined', () => {
    assert.deepEqual(parseMavenLocation('mvn:g/a/1.0'), {
      repositoryUrl: undefined,
      group: 'g',
      artifact: 'a',
      version: '1.0',
      type: undefined,
      classifier: undefined
    });
  });
});

describe('stripVersionQualifier', () => {
  it('removes everything from the first $', () => {
    assert.equal(stripVersionQualifier('1.0${build.number}'), '1.0');
    assert.equal(stripVersionQualifier('1.0$a$b'), '1.0');
    assert.equal(stripVersionQualifier('1.0'), '1.0');
  });
});

describe('toCoordinates', () => {
  it('keeps order and duplicates', () => {
    assert.deepEqual(toCoordinates(['mvn:g/b/1', 'mvn:g/a/1', 'mvn:g/b/1']), ['g:b:1', 'g:a:1', 'g:b:1']);
  });

  it('fails on the first malformed location', () => {
    assert.throws(() => toCoordinates(['mvn:g/a/1', 'bogus']), MalformedLocationError);
  });
});
