// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { describe, it, expect } from 'vitest'
import { ArrayMailbox } from '@/actors/ArrayMailbox'
import { BoundedMailbox } from '@/actors/BoundedMailbox'
import { OverflowPolicy } from '@/actors/OverflowPolicy'

describe('ArrayMailbox', () => {
  it('should deliver items in enqueue order', async () => {
    const mailbox = new ArrayMailbox<number>()

    mailbox.send(1)
    mailbox.send(2)
    mailbox.send(3)

    expect(mailbox.size()).toBe(3)
    expect(await mailbox.receive()).toBe(1)
    expect(await mailbox.receive()).toBe(2)
    expect(await mailbox.receive()).toBe(3)
    expect(mailbox.size()).toBe(0)
  })

  it('should resolve a pending receive when an item arrives', async () => {
    const mailbox = new ArrayMailbox<string>()

    const pending = mailbox.receive()
    expect(mailbox.send('hello')).toBe(true)

    expect(await pending).toBe('hello')
    expect(mailbox.size()).toBe(0)
  })

  it('should resolve a pending receive with undefined on close', async () => {
    const mailbox = new ArrayMailbox<string>()

    const pending = mailbox.receive()
    mailbox.close()

    expect(await pending).toBeUndefined()
    expect(mailbox.isClosed()).toBe(true)
  })

  it('should hand out queued items after close, then undefined', async () => {
    const mailbox = new ArrayMailbox<number>()

    mailbox.send(1)
    mailbox.send(2)
    mailbox.close()

    expect(await mailbox.receive()).toBe(1)
    expect(await mailbox.receive()).toBe(2)
    expect(await mailbox.receive()).toBeUndefined()
  })

  it('should refuse sends after close', () => {
    const mailbox = new ArrayMailbox<number>()

    mailbox.close()

    expect(mailbox.send(1)).toBe(false)
    expect(mailbox.size()).toBe(0)
  })

  it('should allow only one pending receive', () => {
    const mailbox = new ArrayMailbox<number>()

    void mailbox.receive()

    expect(() => mailbox.receive()).toThrow('Mailbox has a single consumer; receive is already pending')
  })

  it('should drain queued items without delivering them', () => {
    const mailbox = new ArrayMailbox<number>()

    mailbox.send(1)
    mailbox.send(2)

    expect(mailbox.drain()).toEqual([1, 2])
    expect(mailbox.size()).toBe(0)
  })
})

describe('BoundedMailbox', () => {
  describe('Constructor and basic properties', () => {
    it('should create mailbox with specified capacity', () => {
      const mailbox = new BoundedMailbox<number>(100, OverflowPolicy.DropOldest)

      expect(mailbox.getCapacity()).toBe(100)
      expect(mailbox.overflowPolicy()).toBe(OverflowPolicy.DropOldest)
      expect(mailbox.size()).toBe(0)
      expect(mailbox.isFull()).toBe(false)
      expect(mailbox.droppedMessageCount()).toBe(0)
    })

    it('should throw error for non-positive capacity', () => {
      expect(() => new BoundedMailbox<number>(0, OverflowPolicy.DropOldest))
        .toThrow('Mailbox capacity must be positive')

      expect(() => new BoundedMailbox<number>(-1, OverflowPolicy.DropOldest))
        .toThrow('Mailbox capacity must be positive')
    })
  })

  describe('DropOldest policy', () => {
    it('should drop the head of the queue when full', async () => {
      const dropped: number[] = []
      const mailbox = new BoundedMailbox<number>(2, OverflowPolicy.DropOldest, (item) => dropped.push(item))

      expect(mailbox.send(1)).toBe(true)
      expect(mailbox.send(2)).toBe(true)
      expect(mailbox.send(3)).toBe(true)
      expect(mailbox.send(4)).toBe(true)

      expect(dropped).toEqual([1, 2])
      expect(mailbox.droppedMessageCount()).toBe(2)
      expect(mailbox.drain()).toEqual([3, 4])
    })
  })

  describe('DropNewest policy', () => {
    it('should drop incoming items when full', () => {
      const dropped: number[] = []
      const mailbox = new BoundedMailbox<number>(2, OverflowPolicy.DropNewest, (item) => dropped.push(item))

      mailbox.send(1)
      mailbox.send(2)

      expect(mailbox.send(3)).toBe(true)
      expect(dropped).toEqual([3])
      expect(mailbox.droppedMessageCount()).toBe(1)
      expect(mailbox.drain()).toEqual([1, 2])
    })
  })

  describe('Reject policy', () => {
    it('should refuse incoming items when full', () => {
      const dropped: number[] = []
      const mailbox = new BoundedMailbox<number>(1, OverflowPolicy.Reject, (item) => dropped.push(item))

      expect(mailbox.send(1)).toBe(true)
      expect(mailbox.send(2)).toBe(false)

      expect(dropped).toEqual([])
      expect(mailbox.droppedMessageCount()).toBe(1)
      expect(mailbox.drain()).toEqual([1])
    })
  })

  it('should hand an item straight to a waiting consumer even at capacity 1', async () => {
    const mailbox = new BoundedMailbox<number>(1, OverflowPolicy.Reject)

    const pending = mailbox.receive()
    expect(mailbox.send(1)).toBe(true)
    expect(mailbox.send(2)).toBe(true)
    expect(mailbox.send(3)).toBe(false)

    expect(await pending).toBe(1)
    expect(await mailbox.receive()).toBe(2)
  })
})
