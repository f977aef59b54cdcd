import test from 'ava'
import {MalformedDeclarationError} from '../../errors.js'
import {isJsonObject} from '../../substitution/expand.js'
import {RESOURCE_TYPES, type JsonValue, type ParamSpec, type TaskSpec} from '../../types.js'
import {buildLookupTree, buildTaskContext, resourcePath, toLookupTree} from '../context.js'
import {RESOURCE_PLACEHOLDER_KEYS} from '../resource-keys.js'

function field(tree: JsonValue, ...path: string[]): JsonValue | undefined {
  let current = tree
  for (const segment of path) {
    if (!isJsonObject(current) || !Object.hasOwn(current, segment)) {
      return undefined
    }

    current = current[segment]
  }

  return current
}

// ---------------------------------------------------------------------------
// Parameters
// ---------------------------------------------------------------------------

test('parameters without default get an empty string or an empty list', t => {
  const context = buildTaskContext({params: [{name: 'image'}, {name: 'tag', type: 'string'}, {name: 'flags', type: 'array'}]})
  t.deepEqual(context.params, [
    {kind: 'scalar', name: 'image', value: ''},
    {kind: 'scalar', name: 'tag', value: ''},
    {kind: 'array', name: 'flags', value: []}
  ])
})

test('parameters carry their defaults', t => {
  const tree = buildLookupTree({params: [{name: 'tag', default: 'latest'}, {name: 'flags', type: 'array', default: ['-v']}]})
  t.deepEqual(tree.params, {tag: 'latest', flags: ['-v']})
})

test('a list default picks the array variant whatever the declared type', t => {
  const context = buildTaskContext({params: [{name: 'odd', type: 'string', default: ['a']}]})
  t.deepEqual(context.params, [{kind: 'array', name: 'odd', value: ['a']}])
})

test('a default that is neither string nor list is malformed', t => {
  const bad: ParamSpec = JSON.parse('{"name": "bad", "default": 42}')
  const params: ParamSpec[] = [{name: 'ok'}, bad]
  const error = t.throws(() => buildTaskContext({params}), {instanceOf: MalformedDeclarationError})
  t.deepEqual(error?.paths, ['params[1].default'])
})

// ---------------------------------------------------------------------------
// Workspaces and results
// ---------------------------------------------------------------------------

test('workspace path defaults to /workspace/<name>', t => {
  const tree = buildLookupTree({workspaces: [{name: 'source'}, {name: 'cache', mountPath: '/custom'}]})
  t.is(field(tree, 'workspaces', 'source', 'path'), '/workspace/source')
  t.is(field(tree, 'workspaces', 'cache', 'path'), '/custom')
})

test('result path defaults to /tekton/results/<name>', t => {
  const tree = buildLookupTree({results: [{name: 'digest'}, {name: 'sum', path: '/out/sum'}]})
  t.deepEqual(tree.results, {digest: {path: '/tekton/results/digest'}, sum: {path: '/out/sum'}})
})

test('empty mount and result paths fall back to the defaults', t => {
  const tree = buildLookupTree({workspaces: [{name: 'source', mountPath: ''}], results: [{name: 'digest', path: ''}]})
  t.is(field(tree, 'workspaces', 'source', 'path'), '/workspace/source')
  t.is(field(tree, 'results', 'digest', 'path'), '/tekton/results/digest')
})

test('a parameter named __proto__ is an own key of the namespace', t => {
  const tree = buildLookupTree({params: [{name: '__proto__', default: 'x'}]})
  const {params} = tree
  t.true(isJsonObject(params) && Object.hasOwn(params, '__proto__'))
  t.is(Object.getPrototypeOf(params), Object.prototype)
})

test('context roots come from the options', t => {
  const tree = buildLookupTree(
    {workspaces: [{name: 'source'}], results: [{name: 'digest'}], resources: {outputs: [{name: 'img', type: 'image'}]}},
    {workspaceRoot: '/ws', resultsRoot: '/results'}
  )
  t.is(field(tree, 'workspaces', 'source', 'path'), '/ws/source')
  t.is(field(tree, 'results', 'digest', 'path'), '/results/digest')
  t.is(field(tree, 'resources', 'outputs', 'img', 'path'), '/ws/output/img')
})

// ---------------------------------------------------------------------------
// Resources
// ---------------------------------------------------------------------------

test('resourcePath resolves target paths', t => {
  t.is(resourcePath({name: 'repo', targetPath: '/abs/dir'}, 'input'), '/abs/dir')
  t.is(resourcePath({name: 'repo', targetPath: 'rel/dir'}, 'input'), '/workspace/rel/dir')
  t.is(resourcePath({name: 'repo'}, 'input'), '/workspace/repo')
  t.is(resourcePath({name: 'repo'}, 'output'), '/workspace/output/repo')
  t.is(resourcePath({name: 'repo', targetPath: ''}, 'output'), '/workspace/output/repo')
})

for (const type of RESOURCE_TYPES) {
  test(`${type} resources expose path, name, type and their placeholder keys`, t => {
    const tree = buildLookupTree({resources: {inputs: [{name: 'r', type}]}})
    const resource = field(tree, 'resources', 'inputs', 'r')
    t.true(resource !== undefined && isJsonObject(resource))
    const keys = Object.keys(resource ?? {}).sort()
    t.deepEqual(keys, ['name', 'path', 'type', ...RESOURCE_PLACEHOLDER_KEYS[type]].sort())
  })
}

test('git resource entries hold empty placeholders', t => {
  const tree = buildLookupTree({resources: {inputs: [{name: 'repo', type: 'git'}]}})
  t.deepEqual(field(tree, 'resources', 'inputs', 'repo'), {
    path: '/workspace/repo',
    name: 'repo',
    type: 'git',
    url: '',
    revision: '',
    depth: '',
    sslVerify: ''
  })
})

test('resources with an unknown or missing type expose only path and name', t => {
  const tree = buildLookupTree({resources: {inputs: [{name: 'a', type: 'ftp'}, {name: 'b'}]}})
  t.deepEqual(field(tree, 'resources', 'inputs', 'a'), {path: '/workspace/a', name: 'a'})
  t.deepEqual(field(tree, 'resources', 'inputs', 'b'), {path: '/workspace/b', name: 'b'})
})

// ---------------------------------------------------------------------------
// Lookup tree shape
// ---------------------------------------------------------------------------

test('an empty spec yields empty namespaces and aliases', t => {
  t.deepEqual(buildLookupTree({}), {
    params: {},
    workspaces: {},
    resources: {inputs: {}, outputs: {}},
    results: {},
    inputs: {params: {}, resources: {}},
    outputs: {resources: {}}
  })
})

test('legacy aliases mirror the current namespaces', t => {
  const spec: TaskSpec = {
    params: [{name: 'foo', default: 'bar'}],
    resources: {inputs: [{name: 'src', type: 'git'}], outputs: [{name: 'img', type: 'image'}]}
  }
  const tree = buildLookupTree(spec)
  t.deepEqual(field(tree, 'inputs', 'params'), tree.params)
  t.deepEqual(field(tree, 'inputs', 'resources'), field(tree, 'resources', 'inputs'))
  t.deepEqual(field(tree, 'outputs', 'resources'), field(tree, 'resources', 'outputs'))
})

test('later declarations with the same name shadow earlier ones', t => {
  const tree = toLookupTree(buildTaskContext({params: [{name: 'x', default: 'first'}, {name: 'x', default: 'second'}]}))
  t.deepEqual(tree.params, {x: 'second'})
})

test('a resource named like a parameter does not collide with it', t => {
  const tree = buildLookupTree({params: [{name: 'src', default: 'p'}], resources: {inputs: [{name: 'src', type: 'storage'}]}})
  t.is(field(tree, 'params', 'src'), 'p')
  t.is(field(tree, 'resources', 'inputs', 'src', 'location'), '')
})

test('building the context twice gives equal trees', t => {
  const spec: TaskSpec = {params: [{name: 'flags', type: 'array'}], workspaces: [{name: 'w'}]}
  t.deepEqual(buildLookupTree(spec), buildLookupTree(spec))
})
