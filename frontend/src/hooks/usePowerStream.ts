import { useEffect, useState } from 'react'
import {
  applyMessage,
  initialStreamState,
  MAX_CHART_POINTS,
  parseServerMessage,
  type ChartRow,
  type StreamState,
} from '../lib/stream'

const RECONNECT_DELAY_MS = 2000

export type PowerStream = StreamState & {
  latest: ChartRow | null
  connected: boolean
}

function streamUrl() {
  return (location.protocol === 'https:' ? 'wss://' : 'ws://') + location.host + '/ws'
}

/**
 * Live view of the backend power stream. Keeps a rolling window of chart rows
 * and reconnects when the socket drops.
 */
export function usePowerStream(maxPoints = MAX_CHART_POINTS): PowerStream {
  const [state, setState] = useState<StreamState>(initialStreamState)
  const [connected, setConnected] = useState(false)

  useEffect(() => {
    let ws: WebSocket | null = null
    let retry: ReturnType<typeof setTimeout> | undefined
    let disposed = false

    const connect = () => {
      ws = new WebSocket(streamUrl())
      ws.onopen = () => setConnected(true)
      ws.onmessage = (ev: MessageEvent<string>) => {
        const msg = parseServerMessage(ev.data)
        if (msg) setState(prev => applyMessage(prev, msg, maxPoints))
      }
      ws.onclose = () => {
        setConnected(false)
        if (!disposed) retry = setTimeout(connect, RECONNECT_DELAY_MS)
      }
    }

    connect()
    return () => {
      disposed = true
      clearTimeout(retry)
      ws?.close()
    }
  }, [maxPoints])

  const latest = state.rows.length > 0 ? state.rows[state.rows.length - 1] : null
  return { ...state, latest, connected }
}
