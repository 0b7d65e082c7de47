/**
 * Minimal Server-Sent Events reader: yields the `data` payload of each event
 * in arrival order. Comments, `event:` and `id:` fields are ignored.
 */
export async function* readSseData(body: AsyncIterable<Uint8Array>): AsyncGenerator<string> {
  const decoder = new TextDecoder()
  let buffer = ''
  let data: string[] = []

  function* drainLines(final: boolean): Generator<string> {
    let newline = buffer.search(/\r?\n/)
    while (newline !== -1) {
      const line = buffer.slice(0, newline)
      buffer = buffer.slice(buffer[newline] === '\r' ? newline + 2 : newline + 1)
      yield* handleLine(line)
      newline = buffer.search(/\r?\n/)
    }
    if (final && buffer.length > 0) {
      const line = buffer
      buffer = ''
      yield* handleLine(line)
    }
    if (final && data.length > 0) {
      const payload = data.join('\n')
      data = []
      yield payload
    }
  }

  function* handleLine(line: string): Generator<string> {
    if (line === '') {
      if (data.length > 0) {
        const payload = data.join('\n')
        data = []
        yield payload
      }
      return
    }
    if (line.startsWith(':')) return
    if (line.startsWith('data:')) {
      const value = line.slice(5)
      data.push(value.startsWith(' ') ? value.slice(1) : value)
    }
  }

  for await (const chunk of body) {
    buffer += decoder.decode(chunk, { stream: true })
    yield* drainLines(false)
  }
  buffer += decoder.decode()
  yield* drainLines(true)
}
