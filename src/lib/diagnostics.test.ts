import { formatDiagnosticsTable, diagnosticsRows, DIAGNOSTICS_COLUMNS } from './diagnostics'
import { synthesizeSpline } from './geometry/Spline'
import type { DiagnosticsReport } from './types'

function traced(): DiagnosticsReport {
  const hook = vi.fn()
  synthesizeSpline([{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 4, y: 0 }], 0.5, { onDiagnostics: hook })
  return hook.mock.calls[0][0]
}

describe('diagnostics', () => {
  it('carries every intermediate value of an interior knot', () => {
    const [k] = traced().knots
    expect(k.knot).toEqual({ x: 1, y: 0 })
    expect(k.length).toBe(4)
    expect(k.incomingLength).toBe(0.5)
    expect(k.outgoingLength).toBe(1.5)
    expect(k.outgoing).toEqual({ x: 2.5, y: 0 })
  })

  it('formats fixed-precision rows', () => {
    expect(diagnosticsRows(traced())).toEqual([{
      knot: '2',
      point: '1.000,0.000',
      joining: '4.000,0.000',
      length: '4.000',
      unit: '1.000,0.000',
      normalA: '0.000,1.000',
      normalB: '0.000,-1.000',
      angleA: '3.142',
      angleB: '0.000',
      incoming: '0.500,0.000',
      outgoing: '2.500,0.000',
    }])
  })

  it('renders a labeled text table', () => {
    const lines = formatDiagnosticsTable(traced(), 1).split('\n')
    expect(lines).toHaveLength(3)
    expect(lines[0]).toBe('scaling 0.5, 3 knots, 2 segments')
    expect(lines[1].split(/\s+/)).toEqual([...DIAGNOSTICS_COLUMNS])
    expect(lines[2].split(/\s+/)).toEqual([
      '2', '1.0,0.0', '4.0,0.0', '4.0', '1.0,0.0', '0.0,1.0', '0.0,-1.0', '3.1', '0.0', '0.5,0.0', '2.5,0.0',
    ])
  })
})
