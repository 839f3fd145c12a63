import { useEffect, useMemo, useState } from 'react'
import SplineView from './components/SplineView'
import DiagnosticsTable from './components/DiagnosticsTable'
import type { DiagnosticsReport, Point, Spline } from './lib/types'
import { synthesizeSpline } from './lib/geometry/Spline'
import { parsePoints, formatPoints } from './lib/parsePoints'
import { toPathData } from './lib/serialization'
import { toSvgDocument } from './lib/svgDocument'
import { isSplineError } from './lib/errors'
import { CANVAS, DEFAULT_SCALING, SAMPLE_POINTS, isRecommendedScaling } from './lib/config'

type Result =
  | { ok: true; points: Point[]; spline: Spline; report: DiagnosticsReport | null }
  | { ok: false; message: string }

function compute(text: string, scaling: number, withDiagnostics: boolean): Result {
  try {
    const points = parsePoints(text)
    let report: DiagnosticsReport | null = null
    const spline = synthesizeSpline(points, scaling, withDiagnostics ? { onDiagnostics: r => { report = r } } : {})
    return { ok: true, points, spline, report }
  } catch (err) {
    if (isSplineError(err)) return { ok: false, message: `${err.code}: ${err.message}` }
    throw err
  }
}

export default function App() {
  const [text, setText] = useState(() => formatPoints(SAMPLE_POINTS))
  const [scaling, setScaling] = useState(DEFAULT_SCALING)
  const [showDiagnostics, setShowDiagnostics] = useState(false)

  const result = useMemo(() => compute(text, scaling, showDiagnostics), [text, scaling, showDiagnostics])

  useEffect(() => {
    if (result.ok) {
      console.log('telemetry: spline_render', { segments: result.spline.segments.length, scaling })
    } else {
      console.warn('spline input rejected:', result.message)
    }
  }, [result, scaling])

  return (
    <div style={{ padding: 16, fontFamily: 'system-ui, sans-serif', color: '#111827' }}>
      <label style={{ display: 'block', marginBottom: 8 }}>
        Points (x,y separated by spaces)
        <textarea
          value={text}
          onChange={e => setText(e.target.value)}
          rows={2}
          style={{ display: 'block', width: '100%', fontFamily: 'monospace' }}
        />
      </label>

      <label style={{ display: 'block', marginBottom: 8 }}>
        Scaling {scaling.toFixed(2)}{isRecommendedScaling(scaling) ? '' : ' (outside 0.33–0.5)'}
        <input
          type="range"
          min={0}
          max={1}
          step={0.01}
          value={scaling}
          onChange={e => setScaling(Number(e.target.value))}
          style={{ display: 'block', width: 240 }}
        />
      </label>

      <label style={{ display: 'block', marginBottom: 12 }}>
        <input type="checkbox" checked={showDiagnostics} onChange={e => setShowDiagnostics(e.target.checked)} />
        {' '}Show construction lines
      </label>

      {result.ok ? (
        <>
          <div style={{ border: '1px solid #e5e7eb', display: 'inline-block' }}>
            <SplineView spline={result.spline} points={result.points} diagnostics={result.report} width={CANVAS.width} height={CANVAS.height} />
          </div>
          <pre style={{ whiteSpace: 'pre-wrap', fontSize: 12 }}>{toPathData(result.spline, { precision: 3 })}</pre>
          {result.report && <DiagnosticsTable report={result.report} />}
          <details>
            <summary>SVG export</summary>
            <pre style={{ whiteSpace: 'pre-wrap', fontSize: 11 }}>
              {toSvgDocument(result.spline, result.points, { width: CANVAS.width, height: CANVAS.height, precision: 3 })}
            </pre>
          </details>
        </>
      ) : (
        <p role="alert" style={{ color: '#b91c1c' }}>{result.message}</p>
      )}
    </div>
  )
}
