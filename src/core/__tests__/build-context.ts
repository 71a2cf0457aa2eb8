import {mkdir, readFile, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {MissingDependencyError, ValidationError} from '../../errors.js'
import type {Lock} from '../../types.js'
import {createTmpDir, dockerStep, lockedBase, lockedFeature} from '../../__tests__/helpers.js'
import {writeBuildContext} from '../build-context.js'

const setup = lockedFeature({
  name: 'setup',
  version: '1',
  tag: 'setup1',
  steps: [dockerStep(['COPY files/setup /opt/setup', 'RUN sh /opt/setup/install.sh'], ['files/setup'])]
})

const lock: Lock = {
  bases: [lockedBase({name: 'alpine', version: '3.19', tag: 'alpine3.19', packageManager: 'apk'})],
  features: [setup],
  builds: [{
    target: 'alpine3.19-setup1',
    imageName: 'alpine-setup',
    imageTag: '1',
    base: {name: 'alpine', version: '3.19'},
    features: [{name: 'setup', version: '1'}]
  }]
}

test('writes the Dockerfile and copies dependencies into the output directory', async t => {
  const contextDir = await createTmpDir()
  await mkdir(join(contextDir, 'files', 'setup'), {recursive: true})
  await writeFile(join(contextDir, 'files', 'setup', 'install.sh'), 'echo installed\n')
  const outDir = join(await createTmpDir(), 'build')

  const result = await writeBuildContext(lock, {contextDir, outDir})

  t.deepEqual(result, {dockerfile: join(outDir, 'Dockerfile'), dependencies: ['files/setup']})
  t.is(await readFile(join(outDir, 'files', 'setup', 'install.sh'), 'utf8'), 'echo installed\n')
  t.is(await readFile(result.dockerfile, 'utf8'), [
    'FROM registry.test/alpine:3.19 AS alpine3.19',
    '',
    'FROM alpine3.19 AS alpine3.19-setup1',
    'COPY files/setup /opt/setup',
    'RUN sh /opt/setup/install.sh',
    ''
  ].join('\n'))
})

test('writes nothing when a dependency is missing', async t => {
  const outDir = join(await createTmpDir(), 'build')
  await t.throwsAsync(writeBuildContext(lock, {contextDir: await createTmpDir(), outDir}), {instanceOf: MissingDependencyError})
  await t.throwsAsync(readFile(join(outDir, 'Dockerfile'), 'utf8'), {code: 'ENOENT'})
})

test('leaves dependencies in place when writing into the context directory', async t => {
  const contextDir = await createTmpDir()
  await mkdir(join(contextDir, 'files', 'setup'), {recursive: true})
  await writeFile(join(contextDir, 'files', 'setup', 'install.sh'), 'echo installed\n')

  const result = await writeBuildContext(lock, {contextDir, outDir: contextDir})

  t.is(result.dockerfile, join(contextDir, 'Dockerfile'))
  t.is(await readFile(join(contextDir, 'files', 'setup', 'install.sh'), 'utf8'), 'echo installed\n')
})

test('rejects dependencies outside the context directory', async t => {
  const root = await createTmpDir()
  const contextDir = join(root, 'context')
  await mkdir(contextDir)
  await writeFile(join(root, 'shared.sh'), 'echo shared\n')
  const outside: Lock = {
    ...lock,
    features: [lockedFeature({...setup, steps: [dockerStep(['COPY shared.sh /opt/'], ['../shared.sh'])]})]
  }
  const outDir = join(root, 'build')

  await t.throwsAsync(writeBuildContext(outside, {contextDir, outDir}), {
    instanceOf: ValidationError,
    message: `Dependency "../shared.sh" is outside the build context ${contextDir}`
  })
  await t.throwsAsync(readFile(join(outDir, 'Dockerfile'), 'utf8'), {code: 'ENOENT'})
})
