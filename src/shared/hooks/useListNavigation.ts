import { useState, useEffect, useCallback } from 'react'
import { useInput } from 'ink'

export interface ListPosition {
  selectedIndex: number
  /** First visible item index */
  viewportStart: number
}

export type ListMove = 'down' | 'up' | 'pageDown' | 'pageUp' | 'halfDown' | 'halfUp' | 'start' | 'end'

const clamp = (value: number, min: number, max: number) => Math.max(min, Math.min(value, max))

const EMPTY_POSITION: ListPosition = { selectedIndex: 0, viewportStart: 0 }

/**
 * Keeps the selection inside the list and the viewport around the selection.
 */
export const clampPosition = (position: ListPosition, itemCount: number, viewportSize: number): ListPosition => {
  if (itemCount === 0) return EMPTY_POSITION

  const size = Math.max(1, Math.min(viewportSize, itemCount))
  const selectedIndex = clamp(position.selectedIndex, 0, itemCount - 1)

  let viewportStart = clamp(position.viewportStart, 0, itemCount - size)
  if (selectedIndex < viewportStart) {
    viewportStart = selectedIndex
  } else if (selectedIndex >= viewportStart + size) {
    viewportStart = selectedIndex - size + 1
  }

  return { selectedIndex, viewportStart }
}

/**
 * Applies one navigation move.
 *
 * @example
 * moveSelection({ selectedIndex: 9, viewportStart: 0 }, 'down', 50, 10)
 * // => { selectedIndex: 10, viewportStart: 1 }
 */
export const moveSelection = (
  position: ListPosition,
  move: ListMove,
  itemCount: number,
  viewportSize: number
): ListPosition => {
  const size = Math.max(1, Math.min(viewportSize, itemCount))
  const half = Math.max(1, Math.floor(size / 2))

  const offsets: Record<ListMove, number> = {
    down: 1,
    up: -1,
    pageDown: size,
    pageUp: -size,
    halfDown: half,
    halfUp: -half,
    start: -itemCount,
    end: itemCount,
  }

  return clampPosition(
    { ...position, selectedIndex: position.selectedIndex + offsets[move] },
    itemCount,
    viewportSize
  )
}

interface UseListNavigationOptions {
  itemCount: number
  /** Number of visible rows */
  viewportSize?: number
  /** Whether keys are handled (off while a text input has focus) */
  enabled?: boolean
  /** Selection jumps back to the top whenever this value changes */
  resetKey?: unknown
}

interface UseListNavigationResult {
  selectedIndex: number
  /** Slice indices of the rows to render */
  visibleRange: { start: number; end: number }
  /** e.g. "12/45" */
  positionDisplay: string
  isSelected: (index: number) => boolean
}

/**
 * List navigation with virtual scrolling: j/k or arrows, PgUp/PgDn,
 * Ctrl+d/u for half pages, G and gg for the ends.
 *
 * @example
 * const { visibleRange, isSelected } = useListNavigation({ itemCount: expenses.length, viewportSize: 20 })
 *
 * expenses.slice(visibleRange.start, visibleRange.end).map((expense, i) => (
 *   <ExpenseRow key={visibleRange.start + i} expense={expense} isSelected={isSelected(visibleRange.start + i)} />
 * ))
 */
export const useListNavigation = ({
  itemCount,
  viewportSize = 20,
  enabled = true,
  resetKey,
}: UseListNavigationOptions): UseListNavigationResult => {
  const [position, setPosition] = useState<ListPosition>(EMPTY_POSITION)
  const [waitingForG, setWaitingForG] = useState(false)

  const move = useCallback(
    (listMove: ListMove) => setPosition((prev) => moveSelection(prev, listMove, itemCount, viewportSize)),
    [itemCount, viewportSize]
  )

  useEffect(() => {
    setPosition(EMPTY_POSITION)
  }, [resetKey])

  // Re-clamp when the list shrinks or the viewport changes
  useEffect(() => {
    setPosition((prev) => {
      const next = clampPosition(prev, itemCount, viewportSize)
      return next.selectedIndex === prev.selectedIndex && next.viewportStart === prev.viewportStart ? prev : next
    })
  }, [itemCount, viewportSize])

  useInput(
    (input, key) => {
      if (waitingForG) {
        setWaitingForG(false)
        if (input === 'g') {
          move('start')
          return
        }
      }

      if (key.ctrl && input === 'd') {
        move('halfDown')
      } else if (key.ctrl && input === 'u') {
        move('halfUp')
      } else if (input === 'G') {
        move('end')
      } else if (input === 'g') {
        setWaitingForG(true)
      } else if (input === 'j' || key.downArrow) {
        move('down')
      } else if (input === 'k' || key.upArrow) {
        move('up')
      } else if (key.pageDown) {
        move('pageDown')
      } else if (key.pageUp) {
        move('pageUp')
      }
    },
    { isActive: enabled }
  )

  const { selectedIndex, viewportStart } = position
  const isSelected = useCallback((index: number) => index === selectedIndex, [selectedIndex])

  return {
    selectedIndex,
    visibleRange: {
      start: viewportStart,
      end: Math.min(viewportStart + Math.min(viewportSize, itemCount), itemCount),
    },
    positionDisplay: itemCount > 0 ? `${selectedIndex + 1}/${itemCount}` : '0/0',
    isSelected,
  }
}
