/**
 * Helpers for testing model gateways without a network.
 */

/**
 * Collects every item of an async iterable into an array.
 */
export async function collectEvents<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = []
  for await (const item of iterable) {
    items.push(item)
  }
  return items
}

/**
 * Builds a streaming HTTP response whose body delivers `chunks` one by one.
 */
export function streamingResponse(chunks: string[], init: ResponseInit = { status: 200 }): Response {
  const encoder = new TextEncoder()
  const body = new ReadableStream<Uint8Array>({
    start(controller): void {
      for (const chunk of chunks) {
        controller.enqueue(encoder.encode(chunk))
      }
      controller.close()
    },
  })
  return new Response(body, init)
}

/**
 * Formats objects as server-sent event `data:` lines.
 */
export function sseData(...payloads: Array<Record<string, unknown> | '[DONE]'>): string {
  return payloads.map((payload) => `data: ${payload === '[DONE]' ? payload : JSON.stringify(payload)}\n\n`).join('')
}
