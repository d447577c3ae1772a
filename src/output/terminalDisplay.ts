import logUpdate from 'log-update'
import { SPINNER_INTERVAL_MS } from '../constants.js'

// Constants

const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏']

// Main Function

// On a TTY the spinner is the only live line; every message is persisted above it.
// Without a TTY, messages go straight to the console and the spinner is skipped.
export function createTerminalDisplay(isTty = Boolean(process.stdout.isTTY)) {
  let spinnerText = ''
  let frameIndex = 0
  let interval: ReturnType<typeof setInterval> | null = null

  function renderSpinner(): void {
    logUpdate(`${SPINNER_FRAMES[frameIndex % SPINNER_FRAMES.length]} ${spinnerText}`)
  }

  function print(text: string, write: (text: string) => void): void {
    if (interval === null) {
      write(text)

      return
    }

    logUpdate.persist(text)

    renderSpinner()
  }

  return {
    printProgress(text: string): void {
      print(text, console.log)
    },

    printWarning(text: string): void {
      print(text, console.warn)
    },

    printPublished(text: string): void {
      print(text, console.log)
    },

    startSpinner(text: string): void {
      if (!isTty) return

      spinnerText = text
      frameIndex = 0

      renderSpinner()

      interval = setInterval(() => {
        frameIndex += 1

        renderSpinner()
      }, SPINNER_INTERVAL_MS)
    },

    updateSpinner(text: string): void {
      spinnerText = text
    },

    stop(): void {
      if (interval === null) return

      clearInterval(interval)

      interval = null

      logUpdate.clear()
      logUpdate.done()
    }
  }
}

// Types

export type TerminalDisplay = ReturnType<typeof createTerminalDisplay>
