import test from 'ava'
import {DuplicateTargetError, UnresolvedPinError, ValidationError} from '../../errors.js'
import type {BuildDefinition, LockedFeature, MatrixBuildDefinition} from '../../types.js'
import {lockedBase, lockedFeature} from '../../__tests__/helpers.js'
import {type Catalog, cartesian, createCatalog, expandBuilds, targetName, assertUniqueBaseTags} from '../matrix.js'
import {TemplateEngine} from '../template.js'

const engine = new TemplateEngine()

const al2023 = lockedBase({name: 'al2023', version: '2023', tag: 'al2023'})
const ubuntu = lockedBase({name: 'ubuntu', version: '22.04', tag: 'ubuntu22.04', packageManager: 'apt'})

const corretto = [
  lockedFeature({name: 'corretto', placeholder: '21', version: '21.0.2', tag: 'corretto21'}),
  lockedFeature({name: 'corretto', placeholder: '17', version: '17.0.10', tag: 'corretto17'}),
  lockedFeature({name: 'corretto', placeholder: '11', version: '11.0.22', tag: 'corretto11'})
]
const temurin = lockedFeature({name: 'temurin', placeholder: '21', version: '21.0.2', tag: 'temurin21'})
const wildfly = lockedFeature({name: 'wildfly', placeholder: '31', version: '31.0.1', tag: 'wildfly31'})
const tomcat = lockedFeature({name: 'tomcat', placeholder: '10.*', version: '10.1.18', tag: 'tomcat10'})

function catalog(features: LockedFeature[] = [...corretto, temurin, wildfly, tomcat]): Catalog {
  return createCatalog([al2023, ubuntu], features)
}

function matrix(features: MatrixBuildDefinition['features'], extra?: Partial<MatrixBuildDefinition>): MatrixBuildDefinition {
  return {
    kind: 'matrix',
    bases: [{name: 'al2023'}, {name: 'ubuntu'}],
    features,
    imageName: 'java',
    imageTag: '{{base.tag}}',
    ...extra
  }
}

function expansionError(build: () => unknown): Error {
  try {
    build()
  } catch (error: unknown) {
    if (error instanceof Error) {
      return error
    }
  }

  throw new Error('expected expansion to fail')
}

// -- helpers -----------------------------------------------------------------

test('cartesian of no groups is one empty tuple', t => {
  t.deepEqual(cartesian([]), [[]])
})

test('cartesian takes one item from every group', t => {
  t.deepEqual(cartesian([['a', 'b'], ['x']]), [['a', 'x'], ['b', 'x']])
})

test('cartesian with an empty group is empty', t => {
  t.deepEqual(cartesian([['a'], []]), [])
})

test('targetName joins non-empty tags', t => {
  t.is(targetName(al2023, [corretto[0], lockedFeature({name: 'blank', version: '1', tag: ''}), wildfly]), 'al2023-corretto21-wildfly31')
})

test('createCatalog keeps every placeholder and the first-seen feature order', t => {
  const result = catalog()
  t.deepEqual(result.features.get('corretto')?.map(feature => feature.placeholder), ['21', '17', '11'])
  t.deepEqual([...result.featureOrder], [['corretto', 0], ['temurin', 1], ['wildfly', 2], ['tomcat', 3]])
})

// -- cardinality -------------------------------------------------------------

test('2 bases × [corretto|temurin] × [wildfly] gives 8 builds', t => {
  const builds = expandBuilds([matrix([[{name: 'corretto'}, {name: 'temurin'}], [{name: 'wildfly'}]])], catalog(), engine)
  t.is(builds.length, 8)
  t.deepEqual(builds.map(build => build.target), [
    'al2023-corretto21-wildfly31',
    'al2023-corretto17-wildfly31',
    'al2023-corretto11-wildfly31',
    'al2023-temurin21-wildfly31',
    'ubuntu22.04-corretto21-wildfly31',
    'ubuntu22.04-corretto17-wildfly31',
    'ubuntu22.04-corretto11-wildfly31',
    'ubuntu22.04-temurin21-wildfly31'
  ])
})

test('2 bases × [corretto|temurin] × [wildfly|tomcat] gives 16 builds', t => {
  const builds = expandBuilds([matrix([[{name: 'corretto'}, {name: 'temurin'}], [{name: 'wildfly'}, {name: 'tomcat'}]])], catalog(), engine)
  t.is(builds.length, 16)
  t.is(new Set(builds.map(build => build.target)).size, 16)
})

test('a build without feature groups is one build per base version', t => {
  const builds = expandBuilds([matrix([])], catalog(), engine)
  t.deepEqual(builds.map(build => build.target), ['al2023', 'ubuntu22.04'])
  t.deepEqual(builds[0]?.features, [])
})

test('selectors narrow to the listed placeholders', t => {
  const builds = expandBuilds([matrix([[{name: 'corretto', versions: ['17', '11']}]], {bases: [{name: 'al2023'}]})], catalog(), engine)
  t.deepEqual(builds.map(build => build.target), ['al2023-corretto17', 'al2023-corretto11'])
})

// -- ordering and rendering --------------------------------------------------

test('features follow declaration order, not group order', t => {
  const [build] = expandBuilds([matrix([[{name: 'wildfly'}], [{name: 'corretto', versions: ['21']}]], {bases: [{name: 'al2023'}]})], catalog(), engine)
  t.is(build?.target, 'al2023-corretto21-wildfly31')
  t.deepEqual(build?.features, [{name: 'corretto', version: '21.0.2'}, {name: 'wildfly', version: '31.0.1'}])
})

test('image name and tag render against the selected base and features', t => {
  const build = matrix([[{name: 'corretto', versions: ['21']}, {name: 'temurin'}]], {
    bases: [{name: 'ubuntu'}],
    imageName: 'registry.test/{{base.name}}-java',
    imageTag: '{{base.versions.0}}-{{#if corretto}}c{{corretto.versions.0}}{{else}}t{{temurin.version}}{{/if}}'
  })

  const builds = expandBuilds([build], catalog(), engine)
  t.deepEqual(builds.map(({imageName, imageTag}) => [imageName, imageTag]), [
    ['registry.test/ubuntu-java', '22-c21'],
    ['registry.test/ubuntu-java', '22-t21.0.2']
  ])
})

// -- pinned builds -----------------------------------------------------------

const pinned: BuildDefinition = {
  kind: 'pinned',
  base: {name: 'al2023', version: '2023'},
  features: [{name: 'tomcat', version: '10.*'}, {name: 'corretto', version: '17'}],
  imageName: 'tomcat',
  imageTag: '{{tomcat.version}}'
}

test('a pinned build produces exactly one build', t => {
  t.deepEqual(expandBuilds([pinned], catalog(), engine), [{
    target: 'al2023-corretto17-tomcat10',
    imageName: 'tomcat',
    imageTag: '10.1.18',
    base: {name: 'al2023', version: '2023'},
    features: [{name: 'corretto', version: '17.0.10'}, {name: 'tomcat', version: '10.1.18'}]
  }])
})

test('a pinned build on an undeclared version fails with UnresolvedPin', t => {
  const build: BuildDefinition = {...pinned, features: [{name: 'corretto', version: '8'}]}
  const error = expansionError(() => expandBuilds([build], catalog(), engine))
  t.true(error instanceof UnresolvedPinError)
  t.is(error.message, 'Build pins feature corretto to version "8", which is not declared for it')
})

test('a pinned base on an undeclared version fails with UnresolvedPin', t => {
  const build: BuildDefinition = {...pinned, base: {name: 'al2023', version: '2'}}
  t.true(expansionError(() => expandBuilds([build], catalog(), engine)) instanceof UnresolvedPinError)
})

test('unknown names fail validation', t => {
  const error = expansionError(() => expandBuilds([matrix([[{name: 'graalvm'}]])], catalog(), engine))
  t.true(error instanceof ValidationError)
  t.is(error.message, 'Build references unknown feature "graalvm"')
})

// -- target uniqueness -------------------------------------------------------

test('tags that ignore the version collide', t => {
  const tools = [
    lockedFeature({name: 'tool', version: '1', tag: 'tool'}),
    lockedFeature({name: 'tool', version: '2', tag: 'tool'})
  ]
  const error = expansionError(() => expandBuilds([matrix([[{name: 'tool'}]], {bases: [{name: 'al2023'}]})], catalog(tools), engine))
  t.true(error instanceof DuplicateTargetError)
  t.is(error.message, 'Duplicate build target "al2023-tool": builds al2023@2023 tool@1 and al2023@2023 tool@2 render the same target')
})

test('a build colliding with its base stage fails', t => {
  const blank = [lockedFeature({name: 'blank', version: '1', tag: ''})]
  const error = expansionError(() => expandBuilds([matrix([[{name: 'blank'}]], {bases: [{name: 'al2023'}]})], catalog(blank), engine))
  t.true(error instanceof DuplicateTargetError)
  t.is(error.message, 'Duplicate build target "al2023": build al2023@2023 blank@1 collides with a base stage')
})

test('an exact repeat of a build is dropped', t => {
  const build = matrix([[{name: 'wildfly'}]])
  t.is(expandBuilds([build, build], catalog(), engine).length, 2)
})

test('a repeat with another image tag is a duplicate target', t => {
  const build = matrix([[{name: 'wildfly'}]])
  const error = expansionError(() => expandBuilds([build, {...build, imageTag: 'other'}], catalog(), engine))
  t.true(error instanceof DuplicateTargetError)
})

test('a base without a tag renders an empty target', t => {
  const untagged = lockedBase({name: 'scratch', version: '1', tag: ''})
  const error = expansionError(() => expandBuilds([matrix([], {bases: [{name: 'scratch'}]})], createCatalog([untagged], []), engine))
  t.true(error instanceof ValidationError)
  t.is(error.message, 'Build of base scratch@1 renders an empty target; give the base a version-tag')
})

test('assertUniqueBaseTags rejects distinct bases sharing a tag', t => {
  const other = lockedBase({name: 'al2', version: '2', tag: 'al2023'})
  const error = expansionError(() => {
    assertUniqueBaseTags([al2023, other])
  })
  t.is(error.message, 'Duplicate build target "al2023": bases al2023@2023 and al2@2 share the tag')
  t.notThrows(() => {
    assertUniqueBaseTags([al2023, al2023, ubuntu])
  })
})
