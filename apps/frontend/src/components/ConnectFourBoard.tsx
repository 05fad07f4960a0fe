import type { MouseEvent } from 'react'
import { COLS, ROWS } from '@connect-four/engine'
import { useGameStore, getDiscColor, isWinningCell } from '../stores/gameStore'
import { CELL_SIZE, COLORS, DISC_OUTLINE } from '../config'

interface ConnectFourBoardProps {
  className?: string
}

export function ConnectFourBoard({ className = '' }: ConnectFourBoardProps) {
  const { snapshot, dropAtPixel } = useGameStore()

  const handleClick = (event: MouseEvent<HTMLDivElement>) => {
    if (snapshot.gameOver) return

    const rect = event.currentTarget.getBoundingClientRect()
    dropAtPixel(event.clientX - rect.left)
  }

  const discSize = CELL_SIZE - 2 * DISC_OUTLINE

  return (
    <div
      role="grid"
      aria-label="Connect Four board"
      className={`relative rounded-md shadow-lg ${snapshot.gameOver ? 'cursor-not-allowed' : 'cursor-pointer'} ${className}`}
      style={{ width: COLS * CELL_SIZE, height: ROWS * CELL_SIZE, backgroundColor: COLORS.board }}
      onClick={handleClick}
    >
      {snapshot.board.map((row, rowIndex) =>
        row.map((cell, colIndex) => {
          const winning = isWinningCell(snapshot, rowIndex, colIndex)
          return (
            <div
              key={`${rowIndex}-${colIndex}`}
              role="gridcell"
              className={`absolute rounded-full transition-colors duration-200 ${winning ? 'ring-4 ring-green-400' : ''}`}
              style={{
                left: colIndex * CELL_SIZE + DISC_OUTLINE,
                top: rowIndex * CELL_SIZE + DISC_OUTLINE,
                width: discSize,
                height: discSize,
                backgroundColor: getDiscColor(cell),
                border: cell ? `${DISC_OUTLINE}px solid rgba(0, 0, 0, 0.35)` : undefined,
              }}
            />
          )
        })
      )}
    </div>
  )
}
