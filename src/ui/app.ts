import type { Logger } from "pino";
import type { LaunchRequest } from "../launcher/types.js";
import type { ModalController, ViewModel } from "../modal/controller.js";
import type { ScrollTarget } from "../modal/types.js";
import type { SessionIndex } from "../sessions/session-index.js";
import { keyToIntent, type KeyPress } from "./keymap.js";

/** What the loop draws on and reads keys from; `TerminalView` in production. */
export interface Screen {
  start(): void;
  stop(): void;
  render(vm: ViewModel, scrolls: readonly ScrollTarget[]): void;
  /** Returns an unsubscribe function. */
  onKey(listener: (press: KeyPress) => void): () => void;
  onResize(listener: () => void): () => void;
}

export interface AppOptions {
  controller: ModalController;
  index: SessionIndex;
  view: Screen;
  log: Logger;
}

/**
 * Run the browser until the user quits or picks a session to launch.
 * Keypresses are dispatched one at a time, in arrival order.
 */
export function runApp(options: AppOptions): Promise<LaunchRequest | null> {
  const { controller, index, view } = options;
  const log = options.log.child({ module: "app" });

  return new Promise((resolve, reject) => {
    let queue: Promise<void> = Promise.resolve();
    let finished = false;

    const draw = (): void => {
      if (!finished) view.render(controller.viewModel(), controller.takeScrolls());
    };

    const onKey = (press: KeyPress): void => {
      queue = queue
        .then(async () => {
          if (finished) return;
          const intent = keyToIntent(press, controller.current.mode);
          if (!intent) return;
          log.debug({ intent: intent.type }, "Dispatch");
          const outcome = await controller.dispatch(intent);
          if (outcome.kind === "exit") finish(() => resolve(outcome.request));
          else draw();
        })
        .catch((err: unknown) => finish(() => reject(err)));
    };

    view.start();
    const offKey = view.onKey(onKey);
    const offResize = view.onResize(draw);
    const offChange = index.onChange(draw);

    function finish(settle: () => void): void {
      if (finished) return;
      finished = true;
      offKey();
      offResize();
      offChange();
      view.stop();
      settle();
    }

    draw();
  });
}
