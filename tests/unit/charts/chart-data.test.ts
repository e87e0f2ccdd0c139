import { deepStrictEqual } from 'node:assert'
import { describe, it } from 'node:test'
import { alignColumns } from '../../../src/charts'
import { day } from '../../helpers/series-fixtures'

describe('alignColumns', () => {
  it('should outer-join columns on timestamp', () => {
    const rows = alignColumns([
      [
        { timestamp: day('2020-01-01'), value: 1 },
        { timestamp: day('2020-01-03'), value: 3 }
      ],
      [
        { timestamp: day('2020-01-02'), value: 20 },
        { timestamp: day('2020-01-03'), value: 30 }
      ]
    ])

    deepStrictEqual(rows, [
      { timestamp: day('2020-01-01'), values: [1, null] },
      { timestamp: day('2020-01-02'), values: [null, 20] },
      { timestamp: day('2020-01-03'), values: [3, 30] }
    ])
  })

  it('should sort rows by timestamp', () => {
    const rows = alignColumns([[{ timestamp: day('2020-02-01'), value: 2 }], [{ timestamp: day('2020-01-01'), value: 1 }]])
    deepStrictEqual(rows.map((row) => row.timestamp), [day('2020-01-01'), day('2020-02-01')])
  })

  it('should keep explicit nulls', () => {
    deepStrictEqual(alignColumns([[{ timestamp: 0, value: null }]]), [{ timestamp: 0, values: [null] }])
  })

  it('should return no rows for no columns', () => {
    deepStrictEqual(alignColumns([]), [])
  })
})
