import {access, mkdir, symlink, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {createTmpDir} from '../../__tests__/helpers.js'
import {findStaleOutputs, removeStaleOutputs} from '../stale-outputs.js'

const options = {directoryName: 'target', skipSegments: ['artifacts', '.git', 'node_modules']}

async function makeDir(root: string, ...segments: string[]): Promise<string> {
  const path = join(root, ...segments)
  await mkdir(path, {recursive: true})
  return path
}

test('findStaleOutputs: finds target directories at any depth', async t => {
  const root = await createTmpDir()
  await makeDir(root, 'sqllib', 'target', 'dist')
  await makeDir(root, 'cachelib', 'nested', 'target')
  await makeDir(root, 'configlib', 'src')

  t.deepEqual(await findStaleOutputs(root, options), ['cachelib/nested/target', 'sqllib/target'])
})

test('findStaleOutputs: ignores paths under a skipped segment', async t => {
  const root = await createTmpDir()
  await makeDir(root, 'artifacts', 'sqllib', 'target')
  await makeDir(root, 'node_modules', 'pkg', 'target')
  await makeDir(root, 'sqllib', 'target')

  t.deepEqual(await findStaleOutputs(root, options), ['sqllib/target'])
})

test('findStaleOutputs: does not descend into a matched directory', async t => {
  const root = await createTmpDir()
  await makeDir(root, 'sqllib', 'target', 'nested', 'target')

  t.deepEqual(await findStaleOutputs(root, options), ['sqllib/target'])
})

test('findStaleOutputs: ignores files named like the output directory', async t => {
  const root = await createTmpDir()
  await makeDir(root, 'sqllib')
  await writeFile(join(root, 'sqllib', 'target'), 'not a directory', 'utf8')

  t.deepEqual(await findStaleOutputs(root, options), [])
})

test('findStaleOutputs: does not follow symbolic links', async t => {
  const root = await createTmpDir()
  const outside = await createTmpDir()
  await makeDir(outside, 'target')
  await symlink(outside, join(root, 'linked'))

  t.deepEqual(await findStaleOutputs(root, options), [])
})

test('removeStaleOutputs: deletes the directories and their content', async t => {
  const root = await createTmpDir()
  const dist = await makeDir(root, 'sqllib', 'target', 'dist')
  await writeFile(join(dist, 'sqllib-0.0.1.tar.gz'), 'old', 'utf8')
  const kept = await makeDir(root, 'artifacts', 'sqllib')
  await writeFile(join(kept, 'sqllib-0.0.1.tar.gz'), 'old', 'utf8')

  const removed = await removeStaleOutputs(root, options)

  t.deepEqual(removed, ['sqllib/target'])
  await t.throwsAsync(access(join(root, 'sqllib', 'target')))
  await t.notThrowsAsync(access(join(kept, 'sqllib-0.0.1.tar.gz')))
  await t.notThrowsAsync(access(join(root, 'sqllib')))
})
