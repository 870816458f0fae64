/** Keeps the last `limit` UTF-8 bytes of a stream of text, never splitting a character. */
export class TailBuffer {
    private buffer = ''
    private dropped = 0

    constructor(private readonly limit: number) {}

    append(data: string): void {
        this.buffer += data
        const bytes = Buffer.from(this.buffer, 'utf8')
        if (bytes.length <= this.limit) return

        let start = bytes.length - this.limit
        // continuation bytes belong to a character whose lead byte is already gone
        while (start < bytes.length && (bytes[start] & 0xc0) === 0x80) start++
        this.buffer = bytes.subarray(start).toString('utf8')
        this.dropped += start
    }

    get text(): string {
        return this.buffer
    }

    get truncated(): boolean {
        return this.dropped > 0
    }
}
