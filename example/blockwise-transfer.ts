import {
    CODE_CONTENT, CODE_GET, MessageType, Message,
    appendResponseBlock, extractBlock, generateNextBlock2Request,
} from '../lib/index'

const request = new Message({ type: MessageType.Confirmable, messageId: 0x37, code: CODE_GET, token: Buffer.from([0x5d, 0x1f]) })
request.options.setUriPath(['sensors', 'log'])

const resource = new Message({ type: MessageType.Acknowledgement, code: CODE_CONTENT, token: request.token, payload: Buffer.alloc(600, 0x61) })
resource.options.setETag(Buffer.from([0x01, 0x02]))

function main() {
    try {
        // server sends the first block at 256 bytes, client asks for 64-byte blocks from then on
        const first = extractBlock(resource, 0, 4)
        if (!first) return
        first.messageId = 0x37
        let accumulated = Message.decode(first.encode())
        let next = generateNextBlock2Request(request, accumulated)

        for (;;) {
            const block2 = next.options.getBlock2()
            if (!block2) break
            const served = extractBlock(resource, block2.blockNumber, block2.sizeExponent)
            if (!served) break
            served.messageId = 0x38 + block2.blockNumber
            accumulated = appendResponseBlock(accumulated, Message.decode(served.encode()))
            if (!served.options.getBlock2()?.more) break
            next = generateNextBlock2Request(request, served)
        }

        console.log(request.encode().toString('hex'))
        console.log(accumulated.payload.length)
    } catch (error) {
        console.error(error)
    }
}

main()
