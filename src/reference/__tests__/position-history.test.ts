import { describe, expect, it } from 'vitest'
import { PositionHistory } from '../position-history'

describe('PositionHistory', () => {
  it('pops in reverse order', () => {
    const history = new PositionHistory()
    history.push(3)
    history.push(7)
    expect(history.peek()).toBe(7)
    expect(history.pop()).toBe(7)
    expect(history.pop()).toBe(3)
    expect(history.pop()).toBeUndefined()
  })

  it('drops the oldest entries beyond its limit', () => {
    const history = new PositionHistory(2)
    history.push(1)
    history.push(2)
    history.push(3)
    expect(history.size).toBe(2)
    expect(history.pop()).toBe(3)
    expect(history.pop()).toBe(2)
    expect(history.pop()).toBeUndefined()
  })

  it('clears', () => {
    const history = new PositionHistory()
    history.push(1)
    history.clear()
    expect(history.size).toBe(0)
  })
})
