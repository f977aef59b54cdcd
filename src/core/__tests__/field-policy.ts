import test from 'ava'
import {IllegalArrayUsageError} from '../../errors.js'
import {makeSpec, makeStep} from '../../__tests__/helpers.js'
import {checkArrayIsolation, policyFields, validateArrayUsage, validateParameterUsage} from '../field-policy.js'

const arrays = new Set(['flags'])

// ---------------------------------------------------------------------------
// policyFields
// ---------------------------------------------------------------------------

test('policyFields lists every substitution-eligible field with its policy', t => {
  const fields = policyFields({
    name: 'n',
    image: 'i',
    workingDir: 'w',
    command: ['c0'],
    args: ['a0', 'a1'],
    env: [{name: 'E', value: 'v'}, {name: 'NO_VALUE'}],
    volumeMounts: [{name: 'm', mountPath: '/m', subPath: 's'}]
  })
  t.deepEqual(fields.map(({field, policy}) => `${field}:${policy}`), [
    'name:no-array',
    'image:no-array',
    'workingDir:no-array',
    'command[0]:isolated-array',
    'args[0]:isolated-array',
    'args[1]:isolated-array',
    'env[0].value:no-array',
    'volumeMounts[0].name:no-array',
    'volumeMounts[0].mountPath:no-array',
    'volumeMounts[0].subPath:no-array'
  ])
})

// ---------------------------------------------------------------------------
// checkArrayIsolation
// ---------------------------------------------------------------------------

test('an isolated array reference passes in an isolated-array field', t => {
  t.is(checkArrayIsolation({field: 'args[0]', value: '$(params.flags)', policy: 'isolated-array'}, arrays, 'steps[0]'), undefined)
})

test('one extra leading or trailing character breaks isolation', t => {
  for (const value of ['-$(params.flags)', '$(params.flags)-']) {
    const error = checkArrayIsolation({field: 'args[0]', value, policy: 'isolated-array'}, arrays, 'steps[0]')
    t.true(error instanceof IllegalArrayUsageError)
    t.is(error?.violation, 'not-isolated')
    t.deepEqual(error?.paths, ['steps[0].args[0]'])
  }
})

test('scalar references and literal text are free in isolated-array fields', t => {
  t.is(checkArrayIsolation({field: 'command[0]', value: 'run --tag=$(params.tag)', policy: 'isolated-array'}, arrays, 'steps[0]'), undefined)
})

test('a no-array field rejects even an isolated array reference', t => {
  const error = checkArrayIsolation({field: 'image', value: '$(params.flags)', policy: 'no-array'}, arrays, 'steps[2]')
  t.is(error?.violation, 'prohibited')
  t.is(error?.variable, 'flags')
  t.deepEqual(error?.paths, ['steps[2].image'])
  t.is(error?.message, 'variable type invalid in "$(params.flags)" for step image')
})

test('legacy array references follow the same policy', t => {
  const error = checkArrayIsolation({field: 'workingDir', value: '$(inputs.params.flags)', policy: 'no-array'}, arrays, 'steps[0]')
  t.is(error?.variable, 'flags')
})

test('references below an array name still count as array usage', t => {
  const error = checkArrayIsolation({field: 'args[0]', value: 'x$(params.flags.first)', policy: 'isolated-array'}, arrays, 'steps[0]')
  t.is(error?.variable, 'flags')
})

// ---------------------------------------------------------------------------
// validateArrayUsage
// ---------------------------------------------------------------------------

test('validateArrayUsage accepts isolated command and args entries', t => {
  const steps = [makeStep({command: ['$(params.flags)'], args: ['build', '$(params.flags)']})]
  t.is(validateArrayUsage(steps, arrays), undefined)
})

test('validateArrayUsage reports the first violation in step order', t => {
  const steps = [
    makeStep({args: ['ok']}),
    makeStep({name: 'second', env: [{name: 'FLAGS', value: '$(params.flags)'}], args: ['--x=$(params.flags)']})
  ]
  const error = validateArrayUsage(steps, arrays)
  t.deepEqual(error?.paths, ['steps[1].args[0]'])
})

test('validateArrayUsage checks env values and volume mounts', t => {
  t.deepEqual(validateArrayUsage([makeStep({env: [{name: 'A', value: 'a'}, {name: 'F', value: '$(params.flags)'}]})], arrays)?.paths, ['steps[0].env[1].value'])
  t.deepEqual(validateArrayUsage([makeStep({volumeMounts: [{name: 'v', mountPath: '/v', subPath: '$(params.flags)'}]})], arrays)?.paths, ['steps[0].volumeMounts[0].subPath'])
})

test('validateArrayUsage checks the step template', t => {
  const error = validateArrayUsage([makeStep()], arrays, {workingDir: '/w/$(params.flags)'})
  t.deepEqual(error?.paths, ['stepTemplate.workingDir'])
})

test('validateArrayUsage ignores scalar parameters in no-array fields', t => {
  t.is(validateArrayUsage([makeStep({image: '$(params.image)'})], arrays), undefined)
})

// ---------------------------------------------------------------------------
// validateParameterUsage
// ---------------------------------------------------------------------------

test('validateParameterUsage takes array names from the declared parameters', t => {
  const image = '$(params.flags)'
  t.is(validateParameterUsage(makeSpec({params: [{name: 'flags'}], steps: [makeStep({image})]})), undefined)

  const error = validateParameterUsage(makeSpec({params: [{name: 'flags', type: 'array'}], steps: [makeStep({image})]}))
  t.true(error instanceof IllegalArrayUsageError)
  t.deepEqual(error?.paths, ['steps[0].image'])
})
