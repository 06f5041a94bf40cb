import type { IRenderer, SceneFrame } from "@tessera/contracts";

/**
 * The slice of an element the status line writes to.
 */
export interface StatusLine {
  textContent: string | null;
  className: string;
}

/**
 * Wrap a renderer so the latest diagnostic on each scene is shown in a
 * status line. Scenes without diagnostics leave the line as it is.
 */
export function withDiagnosticStatus(renderer: IRenderer, status: StatusLine): IRenderer {
  return {
    id: renderer.id,
    render(scene: SceneFrame): void {
      renderer.render(scene);

      const latest = scene.diagnostics.at(-1);
      if (latest) {
        status.textContent = latest.message;
        status.className = latest.severity;
      }
    },
    detach(): void {
      status.textContent = "";
      status.className = "";
      renderer.detach?.();
    },
  };
}
