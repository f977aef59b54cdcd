import test from 'ava'
import {logLevel} from '../utils.js'

test('logLevel reads TASKLINT_LOG_LEVEL case-insensitively', t => {
  t.is(logLevel({TASKLINT_LOG_LEVEL: 'DEBUG'}), 'debug')
})

test('logLevel falls back to info', t => {
  t.is(logLevel({}), 'info')
  t.is(logLevel({TASKLINT_LOG_LEVEL: 'verbose'}), 'info')
})
