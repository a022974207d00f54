import { describe, expect, it } from "vitest"
import { ByteCursor, readFrame, writeFrame } from "./cursor.js"

describe("ByteCursor", () => {
  it("reads little-endian integers in sequence", () => {
    const cursor = new ByteCursor(
      new Uint8Array([
        0x7f, // u8
        0x34, 0x12, // u16
        0x78, 0x56, 0x34, 0x12, // u32
        0x01, 0, 0, 0, 0, 0, 0, 0x80, // u64
      ]),
    )

    expect(cursor.readUint8()).toBe(0x7f)
    expect(cursor.readUint16()).toBe(0x1234)
    expect(cursor.readUint32()).toBe(0x12345678)
    expect(cursor.readUint64()).toBe(0x8000_0000_0000_0001n)
    expect(cursor.remaining).toBe(0)
  })

  it("returns undefined without advancing when bytes run out", () => {
    const cursor = new ByteCursor(new Uint8Array([1, 2, 3]))

    expect(cursor.readUint32()).toBeUndefined()
    expect(cursor.readUint64()).toBeUndefined()
    expect(cursor.take(4)).toBeUndefined()
    expect(cursor.offset).toBe(0)

    expect(cursor.readUint16()).toBe(0x0201)
    expect(cursor.readUint16()).toBeUndefined()
    expect(cursor.offset).toBe(2)
  })

  it("takes views and exposes the unread rest", () => {
    const cursor = new ByteCursor(new Uint8Array([1, 2, 3, 4, 5]), 1)

    expect(Array.from(cursor.take(2) ?? [])).toEqual([2, 3])
    expect(Array.from(cursor.rest())).toEqual([4, 5])
    expect(cursor.offset).toBe(3)
  })

  it("peeks a u32 without moving", () => {
    const cursor = new ByteCursor(new Uint8Array([5, 0, 0, 0]))

    expect(cursor.peekUint32()).toBe(5)
    expect(cursor.offset).toBe(0)
  })

  it("only skips forward within the buffer", () => {
    const cursor = new ByteCursor(new Uint8Array(4))

    cursor.skip(3)
    expect(cursor.remaining).toBe(1)
    expect(() => cursor.skip(2)).toThrow(RangeError)
    expect(() => cursor.skip(-1)).toThrow(RangeError)
  })

  it("rejects a start offset outside the buffer", () => {
    expect(() => new ByteCursor(new Uint8Array(2), 3)).toThrow(RangeError)
  })
})

describe("readFrame", () => {
  it("reads a frame and leaves the cursor after it", () => {
    const cursor = new ByteCursor(new Uint8Array([2, 0, 0, 0, 0xaa, 0xbb, 0xcc]))
    const frame = readFrame(cursor)

    expect(frame.status).toBe("frame")
    if (frame.status === "frame") {
      expect(frame.start).toBe(0)
      expect(frame.length).toBe(2)
      expect(Array.from(frame.bytes)).toEqual([0xaa, 0xbb])
    }
    expect(cursor.offset).toBe(6)
  })

  it("reads an empty frame", () => {
    const cursor = new ByteCursor(new Uint8Array([0, 0, 0, 0]))
    const frame = readFrame(cursor)

    expect(frame).toMatchObject({ status: "frame", length: 0 })
    expect(cursor.remaining).toBe(0)
  })

  it("reports a truncated length prefix", () => {
    const cursor = new ByteCursor(new Uint8Array([1, 0, 0]))

    expect(readFrame(cursor)).toEqual({
      status: "truncated_length",
      start: 0,
      available: 3,
    })
    expect(cursor.offset).toBe(0)
  })

  it("reports a length pointing past the buffer", () => {
    const cursor = new ByteCursor(new Uint8Array([0xff, 0, 0, 0, 1, 2]))

    expect(readFrame(cursor)).toEqual({
      status: "out_of_bounds",
      start: 0,
      length: 255,
      available: 2,
    })
    expect(cursor.offset).toBe(0)
  })

  it("writes frames that readFrame reads back", () => {
    const frame = writeFrame(new Uint8Array([7, 8, 9]))
    expect(Array.from(frame)).toEqual([3, 0, 0, 0, 7, 8, 9])

    const read = readFrame(new ByteCursor(frame))
    expect(read).toMatchObject({ status: "frame", length: 3 })
  })
})
