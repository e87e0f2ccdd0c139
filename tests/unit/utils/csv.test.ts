import { deepStrictEqual, strictEqual } from 'node:assert'
import { describe, it } from 'node:test'
import { formatCsvField, parseCsvLine } from '../../../src/utils'

describe('CSV helpers', () => {
  describe('parseCsvLine', () => {
    it('should split and trim plain fields', () => {
      deepStrictEqual(parseCsvLine('2020-01-02, 10.5 ,100'), ['2020-01-02', '10.5', '100'])
    })

    it('should handle quoted delimiters and escaped quotes', () => {
      deepStrictEqual(parseCsvLine('a,"b,c","d""e"'), ['a', 'b,c', 'd"e'])
    })

    it('should honor a custom delimiter', () => {
      deepStrictEqual(parseCsvLine('a;b,c;d', ';'), ['a', 'b,c', 'd'])
    })

    it('should keep empty fields', () => {
      deepStrictEqual(parseCsvLine('a,,'), ['a', '', ''])
    })
  })

  describe('formatCsvField', () => {
    it('should leave plain values alone', () => {
      strictEqual(formatCsvField('AAPL'), 'AAPL')
    })

    it('should quote values with delimiters or quotes', () => {
      strictEqual(formatCsvField('a,b'), '"a,b"')
      strictEqual(formatCsvField('say "hi"'), '"say ""hi"""')
      strictEqual(formatCsvField('a;b', ';'), '"a;b"')
    })
  })
})
