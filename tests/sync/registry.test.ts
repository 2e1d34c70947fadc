/**
 * Tests for the subscription registry
 */

import { describe, it, expect, vi } from 'vitest'
import { SubscriptionRegistry } from '../../src/sync/registry'
import { createLogger, type LogEntry } from '../../src/logging'

function createRegistry() {
  return new SubscriptionRegistry<string>({ logger: createLogger({ handlers: [] }) })
}

describe('SubscriptionRegistry', () => {
  describe('addListener', () => {
    it('should ask for a subscribe only for the first listener of a key', () => {
      const registry = createRegistry()

      const first = registry.addListener('rooms/1', () => {})
      const second = registry.addListener('rooms/1', () => {})
      const other = registry.addListener('rooms/2', () => {})

      expect(first.needsSubscribe).toBe(true)
      expect(second.needsSubscribe).toBe(false)
      expect(other.needsSubscribe).toBe(true)
      expect(first.listenerId).not.toBe(second.listenerId)
      expect(registry.listenerCount()).toBe(3)
      expect(registry.listenerCount('rooms/1')).toBe(2)
    })
  })

  describe('removeListener', () => {
    it('should keep the key while a listener remains and drop it with the last one', () => {
      const registry = createRegistry()
      const a = registry.addListener('t', () => {})
      const b = registry.addListener('t', () => {})

      expect(registry.removeListener('t', a.listenerId)).toBe(1)
      expect(registry.has('t')).toBe(true)

      expect(registry.removeListener('t', b.listenerId)).toBe(0)
      expect(registry.has('t')).toBe(false)
      expect(registry.activeTopics()).toEqual([])
    })

    it('should ask for a subscribe again after the key emptied', () => {
      const registry = createRegistry()
      const a = registry.addListener('t', () => {})
      registry.removeListener('t', a.listenerId)

      expect(registry.addListener('t', () => {}).needsSubscribe).toBe(true)
    })

    it('should ignore unknown keys and ids', () => {
      const registry = createRegistry()
      registry.addListener('t', () => {})

      expect(registry.removeListener('missing', 'listener_1')).toBe(1)
      expect(registry.removeListener('t', 'listener_99')).toBe(1)
    })
  })

  describe('removeTopic', () => {
    it('should remove exactly the given key', () => {
      const registry = createRegistry()
      registry.addListener('posts', () => {})
      registry.addListener('posts?options=x', () => {})

      expect(registry.removeTopic('posts')).toEqual({ removed: ['posts'], hasActiveTopics: true })
      expect(registry.activeTopics()).toEqual(['posts?options=x'])
    })

    it('should remove everything without a key', () => {
      const registry = createRegistry()
      registry.addListener('a', () => {})
      registry.addListener('b', () => {})

      expect(registry.removeTopic()).toEqual({ removed: ['a', 'b'], hasActiveTopics: false })
    })
  })

  describe('removeTopicVariants', () => {
    it('should remove the topic with its option variants but not longer topics', () => {
      const registry = createRegistry()
      registry.addListener('posts/*', () => {})
      registry.addListener('posts/*?options=%7B%7D', () => {})
      registry.addListener('posts/*x', () => {})

      const result = registry.removeTopicVariants('posts/*')

      expect(result.removed).toEqual(['posts/*', 'posts/*?options=%7B%7D'])
      expect(result.hasActiveTopics).toBe(true)
      expect(registry.activeTopics()).toEqual(['posts/*x'])
    })

    it('should match a topic given with options exactly', () => {
      const registry = createRegistry()
      registry.addListener('a?options=1', () => {})
      registry.addListener('a?options=2', () => {})

      expect(registry.removeTopicVariants('a?options=1').removed).toEqual(['a?options=1'])
    })
  })

  describe('removeByPrefix', () => {
    it('should remove every key with the prefix', () => {
      const registry = createRegistry()
      registry.addListener('posts/*', () => {})
      registry.addListener('posts/abc', () => {})
      registry.addListener('users/*', () => {})

      expect(registry.removeByPrefix('posts')).toEqual({
        removed: ['posts/*', 'posts/abc'],
        hasActiveTopics: true,
      })
    })
  })

  describe('fanOut', () => {
    it('should deliver to every listener of the key', () => {
      const registry = createRegistry()
      const a = vi.fn()
      const b = vi.fn()
      const other = vi.fn()
      registry.addListener('t', a)
      registry.addListener('t', b)
      registry.addListener('u', other)

      expect(registry.fanOut('t', 'hello')).toBe(2)
      expect(a).toHaveBeenCalledWith('hello')
      expect(b).toHaveBeenCalledWith('hello')
      expect(other).not.toHaveBeenCalled()
    })

    it('should return 0 for a key without listeners', () => {
      expect(createRegistry().fanOut('t', 'hello')).toBe(0)
    })

    it('should keep delivering when a listener throws', () => {
      const entries: LogEntry[] = []
      const registry = new SubscriptionRegistry<string>({
        logger: createLogger({ handler: (entry) => entries.push(entry) }),
      })
      const after = vi.fn()
      registry.addListener('t', () => {
        throw new Error('boom')
      })
      registry.addListener('t', after)

      expect(registry.fanOut('t', 'x')).toBe(2)
      expect(after).toHaveBeenCalledWith('x')
      expect(entries).toHaveLength(1)
      expect(entries[0]?.level).toBe('error')
      expect(entries[0]?.message).toBe('Listener threw during fan-out')
    })

    it('should deliver to the snapshot when a listener unsubscribes another', () => {
      const registry = createRegistry()
      const second = vi.fn()
      let secondId = ''
      registry.addListener('t', () => {
        registry.removeListener('t', secondId)
      })
      secondId = registry.addListener('t', second).listenerId

      registry.fanOut('t', 'x')
      expect(second).toHaveBeenCalledTimes(1)

      registry.fanOut('t', 'y')
      expect(second).toHaveBeenCalledTimes(1)
    })
  })

  it('should clear everything', () => {
    const registry = createRegistry()
    registry.addListener('a', () => {})
    registry.clear()
    expect(registry.hasActiveTopics()).toBe(false)
  })
})
