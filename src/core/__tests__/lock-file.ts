import {readFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {ValidationError} from '../../errors.js'
import type {Lock} from '../../types.js'
import {createTmpDir, dockerStep, lockedBase, lockedFeature, rpmStep} from '../../__tests__/helpers.js'
import {parseDocument, stringifyDocument} from '../document.js'
import {decodeLock, encodeLock, listImages, readLock, readLockIfExists, targetsPath, writeLock} from '../lock-file.js'

const lock: Lock = {
  bases: [lockedBase({name: 'al2023', version: '2023', tag: 'al2023', identifier: {type: 'Digest', digest: 'sha256:abc'}})],
  features: [
    lockedFeature({
      name: 'corretto',
      placeholder: '21',
      version: '21.0.2',
      tag: 'corretto21',
      steps: [rpmStep({dnf: ['dnf install -y java-21-amazon-corretto-devel']})]
    }),
    lockedFeature({
      name: 'tool',
      version: '1.4',
      tag: '',
      steps: [dockerStep(['RUN make'], ['files/Makefile'], {stage: 'build', copy: {'/src/tool': '/usr/bin/tool'}})]
    })
  ],
  builds: [
    {
      target: 'al2023-corretto21',
      imageName: 'java',
      imageTag: '21.0.2',
      base: {name: 'al2023', version: '2023'},
      features: [{name: 'corretto', version: '21.0.2'}, {name: 'tool', version: '1.4'}]
    },
    {
      target: 'al2023',
      imageName: 'al',
      imageTag: '2023',
      base: {name: 'al2023', version: '2023'},
      features: []
    }
  ]
}

test('encodeLock writes snake_case tables', t => {
  const encoded = encodeLock(lock)
  t.deepEqual(encoded.base, [{
    name: 'al2023',
    placeholder: '2023',
    version: '2023',
    image: 'registry.test/al2023:2023',
    tag: 'al2023',
    package_manager: 'dnf',
    identifier: {type: 'Digest', digest: 'sha256:abc'}
  }])
  t.deepEqual(encoded.build, [
    {
      target: 'al2023-corretto21',
      image_name: 'java',
      image_tag: '21.0.2',
      base: {name: 'al2023', version: '2023'},
      features: [{name: 'corretto', version: '21.0.2'}, {name: 'tool', version: '1.4'}]
    },
    {target: 'al2023', image_name: 'al', image_tag: '2023', base: {name: 'al2023', version: '2023'}, features: []}
  ])
})

test('a lock survives a trip through TOML', t => {
  const text = stringifyDocument(encodeLock(lock), 'images.lock')
  t.deepEqual(decodeLock(parseDocument(text, 'images.lock')), lock)
})

test('decodeLock fills defaults for optional fields', t => {
  const decoded = decodeLock({
    base: [{name: 'alpine', version: '3.19.1', image: 'alpine:3.19', tag: 'alpine3', package_manager: 'apk'}],
    feature: [{name: 'tool', version: '2'}]
  })

  t.deepEqual(decoded, {
    bases: [{name: 'alpine', placeholder: '3.19.1', version: '3.19.1', versions: ['3', '19', '1'], packageManager: 'apk', tag: 'alpine3', image: 'alpine:3.19'}],
    features: [{name: 'tool', placeholder: '2', version: '2', versions: ['2'], tag: '', steps: []}],
    builds: []
  })
})

test('decodeLock rejects malformed locks', t => {
  t.throws(() => decodeLock([]), {instanceOf: ValidationError, message: 'Invalid lock: expected a table'})
  t.throws(() => decodeLock({base: [{name: 'a', version: '1', image: 'a', tag: 'a'}]}), {
    message: 'Invalid lock base #1: "package_manager" must be a string'
  })
  t.throws(() => decodeLock({base: [{name: 'a', version: '1', image: 'a', tag: 'a', package_manager: 'apk', identifier: {type: 'Tag', digest: 'x'}}]}), {
    message: 'Invalid lock base #1: unknown identifier type "Tag"'
  })
  t.throws(() => decodeLock({build: [{target: 't', image_name: 'n', image_tag: 't', base: {name: 'a', version: '1'}, features: 'a'}]}), {
    message: 'Invalid lock build #1: "features" must be a list'
  })
})

test('targetsPath swaps the extension for .txt', t => {
  t.is(targetsPath('/work/images.lock'), '/work/images.txt')
  t.is(targetsPath('/work/images.lock.yaml'), '/work/images.lock.txt')
  t.is(targetsPath('/work/images'), '/work/images.txt')
})

test('writeLock writes the lock and its target list', async t => {
  const dir = await createTmpDir()
  const path = join(dir, 'out', 'images.lock')
  await writeLock(path, lock)

  t.deepEqual(await readLock(path), lock)
  t.is(await readFile(join(dir, 'out', 'images.txt'), 'utf8'), 'al2023-corretto21\nal2023\n')
})

test('writeLock honours the lock extension', async t => {
  const dir = await createTmpDir()
  const path = join(dir, 'images.lock.json')
  await writeLock(path, lock)

  const written: unknown = JSON.parse(await readFile(path, 'utf8'))
  t.deepEqual(written, encodeLock(lock))
})

test('readLockIfExists returns undefined for a missing file', async t => {
  const dir = await createTmpDir()
  t.is(await readLockIfExists(join(dir, 'absent.lock')), undefined)
})

test('listImages lists target, image name and tag per build', t => {
  t.deepEqual(listImages(lock), [
    {target: 'al2023-corretto21', image_name: 'java', image_tag: '21.0.2'},
    {target: 'al2023', image_name: 'al', image_tag: '2023'}
  ])
})
