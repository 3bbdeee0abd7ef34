import { describe, it, expect } from "vitest"
import { ReadWriteLock } from "../src/concurrency"

function settle(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0))
}

function gate(): { wait: Promise<void>; open: () => void } {
  let open: () => void = () => undefined
  const wait = new Promise<void>((resolve) => {
    open = resolve
  })
  return { wait, open }
}

describe("ReadWriteLock", () => {
  it("should let readers overlap", async () => {
    const lock = new ReadWriteLock()
    const barrier = gate()
    const events: string[] = []

    const first = lock.read(async () => {
      events.push("first:start")
      await barrier.wait
      events.push("first:end")
    })
    const second = lock.read(async () => {
      events.push("second:start")
      await barrier.wait
      events.push("second:end")
    })

    await settle()
    expect(events).toEqual(["first:start", "second:start"])

    barrier.open()
    await Promise.all([first, second])
    expect(events).toEqual(["first:start", "second:start", "first:end", "second:end"])
  })

  it("should run a writer alone and serve waiters in arrival order", async () => {
    const lock = new ReadWriteLock()
    const barrier = gate()
    const events: string[] = []

    const writer = lock.write(async () => {
      events.push("write:start")
      await barrier.wait
      events.push("write:end")
    })
    const reader = lock.read(() => {
      events.push("read")
    })
    const nextWriter = lock.write(() => {
      events.push("write2")
    })

    await settle()
    expect(events).toEqual(["write:start"])
    expect(lock.pending).toBe(2)

    barrier.open()
    await Promise.all([writer, reader, nextWriter])
    expect(events).toEqual(["write:start", "write:end", "read", "write2"])
    expect(lock.pending).toBe(0)
  })

  it("should not let new readers overtake a queued writer", async () => {
    const lock = new ReadWriteLock()
    const barrier = gate()
    const events: string[] = []

    const reader = lock.read(async () => {
      await barrier.wait
      events.push("read1")
    })
    const writer = lock.write(() => {
      events.push("write")
    })
    const lateReader = lock.read(() => {
      events.push("read2")
    })

    barrier.open()
    await Promise.all([reader, writer, lateReader])
    expect(events).toEqual(["read1", "write", "read2"])
  })

  it("should release the lock when a task throws", async () => {
    const lock = new ReadWriteLock()

    await expect(
      lock.write(() => {
        throw new Error("boom")
      }),
    ).rejects.toThrow("boom")

    expect(await lock.read(() => "free")).toBe("free")
  })
})
