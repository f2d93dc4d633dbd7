// One-line JSON event log, e.g. {"evt":"room.create","roomCode":"ROOM-ABC123",...}
export function logEvent(evt: string, fields: Record<string, unknown> = {}): void {
  console.log(JSON.stringify({
    evt,
    ...fields,
    timestamp: new Date().toISOString()
  }))
}

export function logError(evt: string, error: unknown, fields: Record<string, unknown> = {}): void {
  console.error(JSON.stringify({
    evt,
    ...fields,
    error: error instanceof Error ? error.message : String(error),
    timestamp: new Date().toISOString()
  }))
}
