import type { PetInput, PetView } from './bridge';
import { clampOpacity, loadConfig, saveConfig, type AppConfig } from './config';
import { reportError } from './errors';
import { fadeIn } from './fade';
import type { DesktopHost, PetWindow, SelectorSurface } from './host';
import { createLogger } from './logger';
import { APP_NAME, buildPetMenu, buildTrayMenu, type PetMenuCommand, type TrayCommand } from './menus';
import {
  IDLE_TIMEOUT_MS,
  PET_SIZE,
  createPetState,
  dragPet,
  enterIdle,
  pressPet,
  releasePet,
  setActiveAnimation,
  setOpacity,
  setPersistPosition,
  toggleLock,
  type PetOptions,
  type PetState,
  type Point,
  type PointerButton,
} from './petState';
import {
  canAddPet,
  canRemovePet,
  clampToWorkArea,
  defaultPetPosition,
  nextPetPosition,
} from './roster';
import {
  createSelectorState,
  deleteSelected,
  displayName,
  importAnimations,
  selectAnimation,
  selectedAnimation,
  setOpacityPercent,
  setTargetPet,
  type SelectorState,
} from './selectorState';

export const DEFAULT_ANIMATION = 'animations/familiar.gif';
export const IDLE_ANIMATION = 'animations/familiar-idle.gif';
export const BUNDLED_ANIMATIONS: readonly string[] = [
  'animations/familiar.gif',
  'animations/familiar-wave.gif',
  'animations/familiar-hop.gif',
];

interface PetRuntime {
  state: PetState;
  window: PetWindow;
  idleTimer: ReturnType<typeof setTimeout> | null;
  cancelFade: (() => void) | null;
}

interface AppState {
  pets: PetRuntime[];
  pendingPets: number;
  nextPetNumber: number;
  selector: SelectorState;
  previewMissing: boolean;
  config: AppConfig;
  idleAnimation: string | null;
  startup: Promise<void> | null;
}

export interface AppSnapshot {
  pets: PetState[];
  selector: SelectorState;
  config: AppConfig;
  idleAnimation: string | null;
}

export interface PetApp {
  start: () => Promise<void>;
  addPet: () => Promise<void>;
  removePet: (petId: string) => Promise<void>;
  openSelectorFor: (petId: string) => Promise<void>;
  showSelector: () => Promise<void>;
  hideSelector: () => Promise<void>;
  quit: () => Promise<void>;

  handlePetInput: (input: PetInput) => Promise<void>;
  petPressed: (petId: string, pointer: Point, button: PointerButton) => Promise<void>;
  petMoved: (petId: string, pointer: Point) => Promise<void>;
  petReleased: (petId: string, button: PointerButton) => Promise<void>;
  petDoubleClicked: (petId: string, button: PointerButton) => Promise<void>;
  petContextMenu: (petId: string) => Promise<void>;
  petReady: (petId: string) => Promise<void>;
  runPetCommand: (petId: string, command: PetMenuCommand) => Promise<void>;
  runTrayCommand: (command: TrayCommand) => Promise<void>;

  selectAnimation: (index: number) => Promise<void>;
  applySelection: () => Promise<void>;
  importAnimations: () => Promise<void>;
  deleteSelected: () => Promise<void>;
  setOpacityPercent: (percent: number) => Promise<void>;

  getState: () => AppSnapshot;
}

const log = createLogger('app');

export function createPetApp(host: DesktopHost, selectorSurface: SelectorSurface): PetApp {
  const state: AppState = {
    pets: [],
    pendingPets: 0,
    nextPetNumber: 1,
    selector: createSelectorState(BUNDLED_ANIMATIONS, 100, null),
    previewMissing: false,
    config: {},
    idleAnimation: null,
    startup: null,
  };

  const petCount = (): number => state.pets.length + state.pendingPets;

  const findPet = (petId: string): PetRuntime | null =>
    state.pets.find((runtime) => runtime.state.id === petId) ?? null;

  const viewOf = (pet: PetState): PetView => ({
    src: host.animationSource(pet.currentAnimation),
    opacity: pet.opacity,
    locked: pet.locked,
    idle: pet.idle,
  });

  const persistConfig = (): Promise<void> => saveConfig(host.configFile, state.config);

  function renderSelector(): void {
    const path = selectedAnimation(state.selector);
    const missing = path !== null && state.previewMissing;
    const targetIndex = state.pets.findIndex(
      (runtime) => runtime.state.id === state.selector.targetPetId,
    );

    selectorSurface.render({
      ...state.selector,
      animations: [...state.selector.animations],
      names: state.selector.animations.map(displayName),
      previewSrc: path !== null && !missing ? host.animationSource(path) : null,
      previewMissing: missing,
      targetLabel:
        targetIndex >= 0
          ? `Editing pet ${targetIndex + 1} of ${state.pets.length}`
          : 'No pet selected',
    });
  }

  async function refreshPreview(): Promise<void> {
    const path = selectedAnimation(state.selector);
    if (path === null) {
      state.previewMissing = false;
      renderSelector();
      return;
    }

    const exists = await host.animationExists(path);
    if (selectedAnimation(state.selector) === path) {
      state.previewMissing = !exists;
    }
    renderSelector();
  }

  /** Commits the new state first, then pushes only what changed to the window. */
  async function updatePet(runtime: PetRuntime, next: PetState): Promise<void> {
    const previous = runtime.state;
    if (previous === next) {
      return;
    }
    runtime.state = next;

    if (previous.x !== next.x || previous.y !== next.y) {
      await runtime.window.moveTo(next.x, next.y);
    }
    if (
      previous.currentAnimation !== next.currentAnimation ||
      previous.opacity !== next.opacity ||
      previous.locked !== next.locked ||
      previous.idle !== next.idle
    ) {
      await runtime.window.render(viewOf(next));
    }
  }

  function stopIdleTimer(runtime: PetRuntime): void {
    if (runtime.idleTimer !== null) {
      clearTimeout(runtime.idleTimer);
      runtime.idleTimer = null;
    }
  }

  function stopFade(runtime: PetRuntime): void {
    if (runtime.cancelFade) {
      runtime.cancelFade();
      runtime.cancelFade = null;
    }
  }

  function resetIdleTimer(runtime: PetRuntime): void {
    stopIdleTimer(runtime);
    const idleAnimation = state.idleAnimation;
    if (!idleAnimation) {
      return;
    }

    runtime.idleTimer = setTimeout(() => {
      runtime.idleTimer = null;
      if (!state.pets.includes(runtime)) {
        return;
      }
      log.debug('Pet went idle', { petId: runtime.state.id });
      updatePet(runtime, enterIdle(runtime.state, idleAnimation)).catch((error: unknown) =>
        reportError(error, 'host', { petId: runtime.state.id }),
      );
    }, IDLE_TIMEOUT_MS);
  }

  async function openPet(animation: string, position: Point, options: PetOptions): Promise<PetRuntime> {
    const id = `pet-${state.nextPetNumber}`;
    state.nextPetNumber += 1;

    state.pendingPets += 1;
    let window: PetWindow;
    try {
      window = await host.openPetWindow({ id, x: position.x, y: position.y, size: PET_SIZE });
    } finally {
      state.pendingPets -= 1;
    }

    const runtime: PetRuntime = {
      state: createPetState(id, animation, position, options),
      window,
      idleTimer: null,
      cancelFade: null,
    };
    state.pets.push(runtime);
    await window.render(viewOf(runtime.state));
    resetIdleTimer(runtime);

    log.info('Pet opened', { petId: id, animation, x: position.x, y: position.y });
    return runtime;
  }

  async function startOnce(): Promise<void> {
    state.config = await loadConfig(host.configFile);
    const config = state.config;

    let startAnimation = config.lastAnimation ?? DEFAULT_ANIMATION;
    if (!(await host.animationExists(startAnimation))) {
      log.info('Last animation is gone, using the default', { path: startAnimation });
      startAnimation = DEFAULT_ANIMATION;
    }
    config.lastAnimation = startAnimation;

    const targetOpacity = clampOpacity(config.opacity ?? 1);

    const idleCandidate = config.idleAnimation ?? IDLE_ANIMATION;
    state.idleAnimation = (await host.animationExists(idleCandidate)) ? idleCandidate : null;

    const workArea = await host.workArea();
    const position = config.position
      ? clampToWorkArea({ x: config.position[0], y: config.position[1] }, workArea)
      : defaultPetPosition(workArea);
    config.position = [position.x, position.y];

    const main = await openPet(startAnimation, position, { opacity: 0, persistPosition: true });
    main.cancelFade = fadeIn(targetOpacity, (opacity) => {
      updatePet(main, setOpacity(main.state, opacity)).catch((error: unknown) =>
        reportError(error, 'host', { petId: main.state.id }),
      );
    });

    state.selector = createSelectorState(
      BUNDLED_ANIMATIONS,
      Math.round(targetOpacity * 100),
      main.state.id,
    );
    await refreshPreview();
    await selectorSurface.show();

    await host.installTray(buildTrayMenu(), APP_NAME, (command) => {
      runTrayCommand(command).catch((error: unknown) => reportError(error, 'handler', { command }));
    });

    await persistConfig();
  }

  /** Overlapping calls share the first start-up. */
  function start(): Promise<void> {
    if (!state.startup) {
      state.startup = startOnce();
    }
    return state.startup;
  }

  async function addPet(): Promise<void> {
    if (!canAddPet(petCount())) {
      log.debug('Pet limit reached');
      return;
    }

    const workArea = await host.workArea();
    if (!canAddPet(petCount())) {
      return;
    }

    const first = state.pets[0] ?? null;
    const animation = first ? first.state.activeAnimation : DEFAULT_ANIMATION;
    const base = first ? { x: first.state.x, y: first.state.y } : defaultPetPosition(workArea);
    const position = nextPetPosition(base, petCount(), workArea);
    const opacity = clampOpacity(state.config.opacity ?? 1);

    await openPet(animation, position, { opacity, persistPosition: false });
    renderSelector();
  }

  async function removePet(petId: string): Promise<void> {
    const runtime = findPet(petId);
    if (!runtime || !canRemovePet(state.pets.length)) {
      return;
    }

    stopIdleTimer(runtime);
    stopFade(runtime);
    state.pets = state.pets.filter((item) => item !== runtime);

    const first = state.pets[0];
    if (first && runtime.state.persistPosition) {
      first.state = setPersistPosition(first.state, true);
    }
    if (state.selector.targetPetId === petId) {
      state.selector = setTargetPet(state.selector, first ? first.state.id : null);
    }
    renderSelector();

    await runtime.window.close();
    log.info('Pet removed', { petId });
  }

  async function showSelector(): Promise<void> {
    renderSelector();
    await selectorSurface.show();
  }

  async function hideSelector(): Promise<void> {
    await selectorSurface.hide();
  }

  async function openSelectorFor(petId: string): Promise<void> {
    if (findPet(petId)) {
      state.selector = setTargetPet(state.selector, petId);
    }
    await showSelector();
  }

  async function quit(): Promise<void> {
    for (const runtime of state.pets) {
      stopIdleTimer(runtime);
      stopFade(runtime);
    }
    log.info('Quitting');
    await host.quit();
  }

  async function petPressed(petId: string, pointer: Point, button: PointerButton): Promise<void> {
    const runtime = findPet(petId);
    if (!runtime) {
      return;
    }

    // Any click on a pet makes it the one the selector edits.
    if (state.selector.targetPetId !== petId) {
      state.selector = setTargetPet(state.selector, petId);
      renderSelector();
    }

    if (button !== 'left') {
      return;
    }
    await updatePet(runtime, pressPet(runtime.state, pointer));
    resetIdleTimer(runtime);
  }

  async function petMoved(petId: string, pointer: Point): Promise<void> {
    const runtime = findPet(petId);
    if (!runtime) {
      return;
    }
    await updatePet(runtime, dragPet(runtime.state, pointer));
  }

  async function petReleased(petId: string, button: PointerButton): Promise<void> {
    const runtime = findPet(petId);
    if (!runtime || button !== 'left') {
      return;
    }

    await updatePet(runtime, releasePet(runtime.state));
    if (runtime.state.persistPosition) {
      state.config.position = [Math.round(runtime.state.x), Math.round(runtime.state.y)];
      await persistConfig();
    }
  }

  async function petDoubleClicked(petId: string, button: PointerButton): Promise<void> {
    const runtime = findPet(petId);
    if (!runtime || button !== 'left') {
      return;
    }
    await updatePet(runtime, toggleLock(runtime.state));
  }

  async function petContextMenu(petId: string): Promise<void> {
    const runtime = findPet(petId);
    if (!runtime) {
      return;
    }

    await host.popupMenu(petId, buildPetMenu(runtime.state.locked, petCount()), (command) => {
      runPetCommand(petId, command).catch((error: unknown) =>
        reportError(error, 'handler', { petId, command }),
      );
    });
  }

  async function petReady(petId: string): Promise<void> {
    const runtime = findPet(petId);
    if (!runtime) {
      return;
    }
    await runtime.window.render(viewOf(runtime.state));
  }

  async function handlePetInput(input: PetInput): Promise<void> {
    switch (input.type) {
      case 'ready':
        return petReady(input.petId);
      case 'press':
        return petPressed(input.petId, { x: input.screenX, y: input.screenY }, input.button);
      case 'move':
        return petMoved(input.petId, { x: input.screenX, y: input.screenY });
      case 'release':
        return petReleased(input.petId, input.button);
      case 'double-click':
        return petDoubleClicked(input.petId, input.button);
      case 'context-menu':
        return petContextMenu(input.petId);
    }
  }

  async function runPetCommand(petId: string, command: PetMenuCommand): Promise<void> {
    switch (command) {
      case 'toggle-lock': {
        const runtime = findPet(petId);
        if (runtime) {
          await updatePet(runtime, toggleLock(runtime.state));
        }
        return;
      }
      case 'change-animation':
        return openSelectorFor(petId);
      case 'add-pet':
        return addPet();
      case 'remove-pet':
        return removePet(petId);
      case 'quit':
        return quit();
    }
  }

  async function runTrayCommand(command: TrayCommand): Promise<void> {
    switch (command) {
      case 'show':
        return showSelector();
      case 'hide':
        return hideSelector();
      case 'quit':
        return quit();
    }
  }

  async function selectAnimationAt(index: number): Promise<void> {
    state.selector = selectAnimation(state.selector, index);
    await refreshPreview();
  }

  async function applySelection(): Promise<void> {
    if (state.pets.length === 0) {
      return;
    }
    const path = selectedAnimation(state.selector);
    if (path === null) {
      return;
    }
    if (!(await host.animationExists(path))) {
      log.debug('Selected animation is missing', { path });
      return;
    }

    const targetId = state.selector.targetPetId;
    const runtime = (targetId !== null ? findPet(targetId) : null) ?? state.pets[0];
    if (!runtime) {
      return;
    }

    await updatePet(runtime, setActiveAnimation(runtime.state, path));
    resetIdleTimer(runtime);

    state.config.lastAnimation = path;
    await persistConfig();
  }

  async function importFromDialog(): Promise<void> {
    const files = await host.pickAnimationFiles();
    if (files.length === 0) {
      return;
    }

    const next = importAnimations(state.selector, files);
    if (next !== state.selector) {
      state.selector = next;
      renderSelector();
    }
  }

  async function deleteSelectedAnimation(): Promise<void> {
    const next = deleteSelected(state.selector);
    if (next === state.selector) {
      return;
    }
    state.selector = next;
    await refreshPreview();
  }

  async function setOpacityFromPercent(percent: number): Promise<void> {
    state.selector = setOpacityPercent(state.selector, percent);
    const opacity = state.selector.opacityPercent / 100;

    await Promise.all(
      state.pets.map((runtime) => {
        stopFade(runtime);
        return updatePet(runtime, setOpacity(runtime.state, opacity));
      }),
    );

    state.config.opacity = opacity;
    renderSelector();
    await persistConfig();
  }

  return {
    start,
    addPet,
    removePet,
    openSelectorFor,
    showSelector,
    hideSelector,
    quit,
    handlePetInput,
    petPressed,
    petMoved,
    petReleased,
    petDoubleClicked,
    petContextMenu,
    petReady,
    runPetCommand,
    runTrayCommand,
    selectAnimation: selectAnimationAt,
    applySelection,
    importAnimations: importFromDialog,
    deleteSelected: deleteSelectedAnimation,
    setOpacityPercent: setOpacityFromPercent,
    getState: () => ({
      pets: state.pets.map((runtime) => runtime.state),
      selector: state.selector,
      config: state.config,
      idleAnimation: state.idleAnimation,
    }),
  };
}
