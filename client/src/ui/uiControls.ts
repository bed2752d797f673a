/**
 * Caption-area widgets: camera reset, robot picker, visibility toggles,
 * opacity slider and the controls manual.
 *
 * Widgets only report what the user did through UiCallbacks; they hold no
 * scene references. Every callback defaults to a no-op except where the
 * caller wires one in.
 */

import { DEFAULT_OPACITY, ROBOT_CHOICES } from '../config';

export interface UiCallbacks {
  onResetCamera(): void;
  onRobotSelected(choice: string): void;
  onReferenceFrameToggle(visible: boolean): void;
  onRobotVisibilityToggle(visible: boolean): void;
  onOpacityChange(opacity: number): void;
}

export const NOOP_UI_CALLBACKS: Readonly<UiCallbacks> = {
  onResetCamera: () => undefined,
  onRobotSelected: () => undefined,
  onReferenceFrameToggle: () => undefined,
  onRobotVisibilityToggle: () => undefined,
  onOpacityChange: () => undefined,
};

export interface UiControlOptions {
  robotChoices?: readonly string[];
}

export interface UiControls {
  panel: HTMLDivElement;
  resetButton: HTMLButtonElement;
  robotMenu: HTMLSelectElement;
  referenceFrameCheckbox: HTMLInputElement;
  robotCheckbox: HTMLInputElement;
  opacitySlider: HTMLInputElement;
  manual: HTMLDivElement;
  dispose: () => void;
}

export const CONTROLS_MANUAL_HTML = `
  <b>Controls</b><br>
  <b>PAN</b><br>
  W , S | <i>forward / backward</i><br>
  A , D | <i>left / right</i><br>
  SPACE , SHIFT | <i>up / down</i><br>
  <b>ROTATE</b><br>
  CTRL + LMB | <i>free spin</i><br>
  ARROW KEYS | <i>rotate direction</i><br>
  Q , E | <i>roll left / right</i><br>
  <b>ZOOM</b><br>
  MOUSEWHEEL | <i>zoom in / out</i><br>
`;

function labelled(input: HTMLInputElement, text: string): HTMLLabelElement {
  const label = document.createElement('label');
  label.append(input, ` ${text}`);
  return label;
}

function row(...children: Node[]): HTMLDivElement {
  const div = document.createElement('div');
  div.className = 'row';
  div.append(...children);
  return div;
}

export function setupUiControls(
  container: HTMLElement,
  callbacks: Partial<UiCallbacks> = {},
  options: UiControlOptions = {},
): UiControls {
  const handlers: UiCallbacks = { ...NOOP_UI_CALLBACKS, ...callbacks };

  const panel = document.createElement('div');
  panel.className = 'ui-controls';

  // ── Reset + robot picker ───────────────────────────────────────
  const resetButton = document.createElement('button');
  resetButton.type = 'button';
  resetButton.textContent = 'Reset Camera';
  resetButton.addEventListener('click', () => handlers.onResetCamera());

  const robotMenu = document.createElement('select');
  for (const choice of options.robotChoices ?? ROBOT_CHOICES) {
    const option = document.createElement('option');
    option.value = choice;
    option.textContent = choice;
    robotMenu.append(option);
  }
  robotMenu.addEventListener('change', () => handlers.onRobotSelected(robotMenu.value));

  // ── Visibility toggles ─────────────────────────────────────────
  const referenceFrameCheckbox = document.createElement('input');
  referenceFrameCheckbox.type = 'checkbox';
  referenceFrameCheckbox.addEventListener('change', () =>
    handlers.onReferenceFrameToggle(referenceFrameCheckbox.checked),
  );

  const robotCheckbox = document.createElement('input');
  robotCheckbox.type = 'checkbox';
  robotCheckbox.addEventListener('change', () =>
    handlers.onRobotVisibilityToggle(robotCheckbox.checked),
  );

  // ── Opacity ────────────────────────────────────────────────────
  const opacitySlider = document.createElement('input');
  opacitySlider.type = 'range';
  opacitySlider.min = '0';
  opacitySlider.max = '1';
  opacitySlider.step = '0.01';
  opacitySlider.value = String(DEFAULT_OPACITY);
  opacitySlider.addEventListener('input', () =>
    handlers.onOpacityChange(Number(opacitySlider.value)),
  );

  const manual = document.createElement('div');
  manual.className = 'controls-manual';
  manual.innerHTML = CONTROLS_MANUAL_HTML;

  panel.append(
    row(resetButton, robotMenu),
    row(
      labelled(referenceFrameCheckbox, 'Show Reference Frames'),
      labelled(robotCheckbox, 'Show Robot'),
    ),
    row(document.createTextNode('Opacity: '), opacitySlider),
    manual,
  );
  container.append(panel);

  return {
    panel,
    resetButton,
    robotMenu,
    referenceFrameCheckbox,
    robotCheckbox,
    opacitySlider,
    manual,
    dispose() {
      panel.remove();
    },
  };
}
