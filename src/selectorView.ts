import type { SelectorViewModel } from './host';
import { OPACITY_PERCENT_MAX, OPACITY_PERCENT_MIN } from './selectorState';

export const PREVIEW_SIZE = 180;

export interface SelectorActions {
  onSelect: (index: number) => void;
  onApply: () => void;
  onImport: () => void;
  onDelete: () => void;
  onOpacity: (percent: number) => void;
}

export interface SelectorView {
  render: (model: SelectorViewModel) => void;
}

function createButton(label: string, className: string, onClick: () => void): HTMLButtonElement {
  const button = document.createElement('button');
  button.type = 'button';
  button.className = className;
  button.textContent = label;
  button.addEventListener('click', onClick);
  return button;
}

export function mountSelectorView(root: HTMLElement, actions: SelectorActions): SelectorView {
  const listElement = document.createElement('ul');
  listElement.className = 'animation-list';
  listElement.setAttribute('role', 'listbox');

  const applyButton = createButton('Use this animation', 'apply-btn', actions.onApply);
  const importButton = createButton('Add animations…', 'import-btn', actions.onImport);
  const deleteButton = createButton('Delete selected', 'delete-btn', actions.onDelete);

  const previewElement = document.createElement('div');
  previewElement.className = 'preview';
  previewElement.style.width = `${PREVIEW_SIZE}px`;
  previewElement.style.height = `${PREVIEW_SIZE}px`;

  const previewImage = document.createElement('img');
  previewImage.alt = '';
  previewImage.width = PREVIEW_SIZE;
  previewImage.height = PREVIEW_SIZE;

  const previewText = document.createElement('span');
  previewText.className = 'preview-text';

  const opacityLabel = document.createElement('label');
  opacityLabel.className = 'opacity-label';
  opacityLabel.htmlFor = 'opacity-slider';

  const opacitySlider = document.createElement('input');
  opacitySlider.type = 'range';
  opacitySlider.id = 'opacity-slider';
  opacitySlider.min = String(OPACITY_PERCENT_MIN);
  opacitySlider.max = String(OPACITY_PERCENT_MAX);
  opacitySlider.step = '1';
  opacitySlider.addEventListener('input', () => {
    actions.onOpacity(Number(opacitySlider.value));
  });

  const targetElement = document.createElement('p');
  targetElement.className = 'target';

  const left = document.createElement('section');
  left.className = 'column list-column';
  left.append(listElement, applyButton);

  const right = document.createElement('section');
  right.className = 'column preview-column';
  right.append(previewElement, opacityLabel, opacitySlider, targetElement);

  const top = document.createElement('div');
  top.className = 'row';
  top.append(left, right);

  const bottom = document.createElement('div');
  bottom.className = 'row buttons';
  bottom.append(importButton, deleteButton);

  root.replaceChildren(top, bottom);

  function renderList(model: SelectorViewModel): void {
    listElement.replaceChildren();
    model.names.forEach((name, index) => {
      const item = document.createElement('li');
      item.textContent = name;
      item.title = model.animations[index] ?? name;
      item.setAttribute('role', 'option');
      item.setAttribute('aria-selected', String(index === model.selectedIndex));
      if (index === model.selectedIndex) {
        item.classList.add('selected');
      }
      item.addEventListener('click', () => actions.onSelect(index));
      listElement.appendChild(item);
    });
  }

  function renderPreview(model: SelectorViewModel): void {
    if (model.previewSrc !== null) {
      previewImage.src = model.previewSrc;
      previewElement.replaceChildren(previewImage);
      return;
    }

    previewImage.removeAttribute('src');
    previewText.textContent = model.previewMissing ? 'File not found' : 'Preview';
    previewElement.replaceChildren(previewText);
  }

  return {
    render: (model) => {
      renderList(model);
      renderPreview(model);

      opacityLabel.textContent = `Opacity: ${model.opacityPercent}%`;
      if (opacitySlider.value !== String(model.opacityPercent)) {
        opacitySlider.value = String(model.opacityPercent);
      }

      const hasSelection = model.selectedIndex >= 0;
      applyButton.disabled = !hasSelection;
      deleteButton.disabled = !hasSelection;
      targetElement.textContent = model.targetLabel;
    },
  };
}
