import { cubicPoint, quadraticPoint, sampleSpline, segmentDerivative } from './Bezier'
import type { Cubic, Quadratic, Spline } from '../types'

const q: Quadratic = { kind: 'quadratic', start: { x: 0, y: 0 }, control: { x: 1, y: 2 }, end: { x: 2, y: 0 } }
const c: Cubic = {
  kind: 'cubic',
  start: { x: 2, y: 0 },
  control1: { x: 3, y: -2 },
  control2: { x: 5, y: 2 },
  end: { x: 6, y: 0 },
}

describe('Bezier evaluation', () => {
  it('quadraticPoint blends the control at t = 0.5', () => {
    expect(quadraticPoint(q, 0.5)).toEqual({ x: 1, y: 1 })
  })

  it('cubicPoint hits both endpoints', () => {
    expect(cubicPoint(c, 0)).toEqual(c.start)
    expect(cubicPoint(c, 1)).toEqual(c.end)
  })

  it('segment derivatives follow the end handles', () => {
    expect(segmentDerivative(q, 1)).toEqual({ x: 2, y: -4 })
    expect(segmentDerivative(c, 0)).toEqual({ x: 3, y: -6 })
  })

  it('sampleSpline emits the start once and every segment end', () => {
    const spline: Spline = { start: q.start, segments: [q, c] }
    const pts = sampleSpline(spline, 4)
    expect(pts).toHaveLength(9)
    expect(pts[0]).toEqual(q.start)
    expect(pts[4]).toEqual(q.end)
    expect(pts[8]).toEqual(c.end)
  })
})
