export default function Header({ connected }: { connected: boolean }) {
  return (
    <header className="border-b border-gray-200 bg-white">
      <div className="flex items-center justify-between px-4 py-4 md:px-6 lg:px-8">
        <div>
          <h1 className="text-xl font-semibold text-gray-900">🔌 Real-Time Power Monitoring Dashboard</h1>
          <p className="text-sm text-gray-500">
            Monitor real-time power consumption of your smart devices and track energy costs.
          </p>
        </div>
        <span
          className={`rounded-full px-3 py-1 text-xs font-medium ${
            connected ? 'bg-emerald-100 text-emerald-700' : 'bg-gray-100 text-gray-500'
          }`}
        >
          {connected ? 'Live' : 'Offline'}
        </span>
      </div>
    </header>
  )
}
