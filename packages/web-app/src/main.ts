import { AudioInitError, DomInputSource, WebAudioSink, animationFrameScheduler } from "@tessera/adapters";
import { Canvas2DRenderer, ScreensaverLoop, ScreensaverSession } from "@tessera/engine";
import type { ExitCode } from "@tessera/engine";
import { withDiagnosticStatus } from "./diagnosticStatus";

// UI elements
const canvas = document.getElementById("canvas") as HTMLCanvasElement;
const startOverlay = document.getElementById("start") as HTMLDivElement;
const statusDiv = document.getElementById("status") as HTMLDivElement;
const diagnosticDiv = document.getElementById("diagnostic") as HTMLDivElement;

// Resize canvas to fill viewport
function resizeCanvas() {
  canvas.width = window.innerWidth;
  canvas.height = window.innerHeight;
}
resizeCanvas();
window.addEventListener("resize", resizeCanvas);

// App state
let loop: ScreensaverLoop | null = null;
let starting = false;

/**
 * Open audio and start the loop. Runs from the start click so the browser
 * allows playback.
 */
async function startScreensaver(): Promise<void> {
  if (loop || starting) return;
  starting = true;

  const audio = new WebAudioSink();
  try {
    statusDiv.textContent = "Opening audio...";
    await audio.init();
  } catch (err) {
    // Tones are a core feature: no audio, no screensaver
    console.error("Audio initialization failed:", err);
    statusDiv.textContent =
      err instanceof AudioInitError ? err.message : "Audio unavailable";
    statusDiv.className = "error";
    starting = false;
    return;
  }

  const renderer = new Canvas2DRenderer();
  const input = new DomInputSource(window);

  try {
    renderer.attach(canvas);

    const session = new ScreensaverSession({
      displaySize: { width: canvas.width, height: canvas.height },
      audio,
    });

    loop = new ScreensaverLoop({
      session,
      renderer: withDiagnosticStatus(renderer, diagnosticDiv),
      input,
      frames: animationFrameScheduler,
    });
    loop.onExit(handleExit);

    startOverlay.classList.add("hidden");
    loop.start();
  } catch (err) {
    console.error("Failed to start screensaver:", err);
    statusDiv.textContent = `Failed to start: ${err}`;
    statusDiv.className = "error";
    if (loop) {
      loop.stop(1);
    } else {
      input.dispose();
      audio.dispose();
      renderer.detach();
    }
  } finally {
    starting = false;
  }
}

/**
 * Loop ended: blank the screen and show the overlay again.
 */
function handleExit(code: ExitCode): void {
  loop = null;

  const ctx = canvas.getContext("2d");
  if (ctx) {
    ctx.fillStyle = "#000";
    ctx.fillRect(0, 0, canvas.width, canvas.height);
  }

  statusDiv.textContent = code === 0 ? "Stopped" : "Stopped after an error (see console)";
  statusDiv.className = code === 0 ? "" : "error";
  startOverlay.classList.remove("hidden");
}

/**
 * Cleanup on page unload
 */
window.addEventListener("beforeunload", () => {
  loop?.stop(0);
});

startOverlay.addEventListener("click", () => {
  startScreensaver().catch((err: unknown) => {
    console.error("Unexpected start failure:", err);
  });
});
