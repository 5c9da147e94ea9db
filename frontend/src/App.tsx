import Dashboard from './components/Dashboard'
import Header from './components/Header'
import { usePowerStream } from './hooks/usePowerStream'

export default function App() {
  const stream = usePowerStream()

  return (
    <div className="min-h-screen bg-gray-50">
      <Header connected={stream.connected} />
      <Dashboard stream={stream} />
    </div>
  )
}
