import { type VElement, classNames, tagList, tags } from "@mobile-f7/markup";

import { colorClass } from "./colors.js";
import { invalidArgument } from "./errors.js";

// =============================================================================
// Shared pieces
// =============================================================================

const requireInputId = (component: string, inputId: string): string => {
  if (inputId.length === 0 || /\s/.test(inputId)) {
    throw invalidArgument(component, "inputId", `inputId must be a non-empty id without spaces, got "${inputId}"`);
  }
  return inputId;
};

const requireFinite = (component: string, argument: string, value: number): number => {
  if (!Number.isFinite(value)) {
    throw invalidArgument(component, argument, `${argument} must be a finite number, got ${value}`);
  }
  return value;
};

/** `data-*` flags are read as strings by the toolkit. */
const flag = (value: boolean): string => (value ? "true" : "false");

const inputList = (...items: VElement[]): VElement =>
  tags.div({ class: "list" }, tags.ul({}, items));

const blockTitle = (label: string | null | undefined) =>
  label === null || label === undefined ? null : tags.div({ class: "block-title" }, label);

/**
 * List item holding a labelled input: the layout shared by text fields,
 * text areas and selects.
 */
const labelledItem = (label: string | null | undefined, wrapClass: string, control: VElement) =>
  tags.li(
    { class: "item-content item-input" },
    tags.div(
      { class: "item-inner" },
      label !== null && label !== undefined && tags.div({ class: "item-title item-label" }, label),
      tags.div({ class: wrapClass }, control),
    ),
  );

// =============================================================================
// Text fields
// =============================================================================

export interface F7TextOptions {
  readonly inputId: string;
  readonly label?: string | null;
  readonly value?: string;
  readonly placeholder?: string | null;
}

const textField = (component: string, type: "text" | "password", options: F7TextOptions): VElement =>
  inputList(
    labelledItem(
      options.label,
      "item-input-wrap",
      tagList(
        tags.input({
          id: requireInputId(component, options.inputId),
          type,
          value: options.value ?? "",
          placeholder: options.placeholder ?? undefined,
        }),
        tags.span({ class: "input-clear-button" }),
      ),
    ),
  );

export const f7Text = (options: F7TextOptions): VElement => textField("f7Text", "text", options);

export const f7Password = (options: F7TextOptions): VElement =>
  textField("f7Password", "password", options);

export interface F7TextAreaOptions extends F7TextOptions {
  /** Grow with the content */
  readonly resize?: boolean;
}

export const f7TextArea = (options: F7TextAreaOptions): VElement =>
  inputList(
    labelledItem(
      options.label,
      "item-input-wrap",
      tagList(
        tags.textarea(
          {
            id: requireInputId("f7TextArea", options.inputId),
            class: options.resize === true ? "resizable" : undefined,
            placeholder: options.placeholder ?? undefined,
          },
          options.value ?? "",
        ),
        tags.span({ class: "input-clear-button" }),
      ),
    ),
  );

// =============================================================================
// Choices
// =============================================================================

/**
 * Either plain values (shown as is) or a label → value record.
 */
export type Choices = ReadonlyArray<string> | Readonly<Record<string, string>>;

interface Choice {
  readonly label: string;
  readonly value: string;
}

const isValueList = (choices: Choices): choices is ReadonlyArray<string> => Array.isArray(choices);

export const normalizeChoices = (component: string, choices: Choices): ReadonlyArray<Choice> => {
  const list = isValueList(choices)
    ? choices.map((value) => ({ label: value, value }))
    : Object.entries(choices).map(([label, value]) => ({ label, value }));
  if (list.length === 0) {
    throw invalidArgument(component, "choices", "choices must not be empty");
  }
  return list;
};

/**
 * Pick the selected value: the one given, which must be a choice, or the first.
 */
const selectedValue = (
  component: string,
  choices: ReadonlyArray<Choice>,
  selected: string | null | undefined,
): string => {
  const first = choices[0];
  if (selected === null || selected === undefined) {
    return first === undefined ? "" : first.value;
  }
  if (!choices.some((choice) => choice.value === selected)) {
    throw invalidArgument(component, "selected", `"${selected}" is not one of the choices`);
  }
  return selected;
};

/**
 * Check a multi-value selection against the choices.
 */
const selectedValues = (
  component: string,
  choices: ReadonlyArray<Choice>,
  selected: ReadonlyArray<string>,
): ReadonlyArray<string> => {
  for (const value of selected) {
    if (!choices.some((choice) => choice.value === value)) {
      throw invalidArgument(component, "selected", `"${value}" is not one of the choices`);
    }
  }
  return selected;
};

export interface F7SelectOptions {
  readonly inputId: string;
  readonly label?: string | null;
  readonly choices: Choices;
  readonly selected?: string | null;
}

export const f7Select = (options: F7SelectOptions): VElement => {
  const choices = normalizeChoices("f7Select", options.choices);
  const selected = selectedValue("f7Select", choices, options.selected);
  return inputList(
    labelledItem(
      options.label,
      "item-input-wrap input-dropdown-wrap",
      tags.select(
        { id: requireInputId("f7Select", options.inputId), class: "input-select" },
        choices.map((choice) =>
          tags.option({ value: choice.value, selected: choice.value === selected }, choice.label),
        ),
      ),
    ),
  );
};

export interface F7RadioOptions {
  readonly inputId: string;
  readonly label?: string | null;
  readonly choices: Choices;
  readonly selected?: string | null;
}

export const f7Radio = (options: F7RadioOptions): VElement => {
  const inputId = requireInputId("f7Radio", options.inputId);
  const choices = normalizeChoices("f7Radio", options.choices);
  const selected = selectedValue("f7Radio", choices, options.selected);
  return tagList(
    blockTitle(options.label),
    tags.div(
      { class: "list", id: inputId },
      tags.ul(
        {},
        choices.map((choice) =>
          tags.li(
            tags.label(
              { class: "item-radio item-content" },
              tags.input({
                type: "radio",
                name: inputId,
                value: choice.value,
                checked: choice.value === selected,
              }),
              tags.i({ class: "icon icon-radio" }),
              tags.div({ class: "item-inner" }, tags.div({ class: "item-title" }, choice.label)),
            ),
          ),
        ),
      ),
    ),
  );
};

// =============================================================================
// Switches
// =============================================================================

export interface F7ToggleOptions {
  readonly inputId: string;
  readonly label?: string | null;
  readonly checked?: boolean;
  readonly color?: string | null;
}

export const f7Toggle = (options: F7ToggleOptions): VElement =>
  inputList(
    tags.li(
      tags.div(
        { class: "item-content" },
        tags.div(
          { class: "item-inner" },
          tags.div({ class: "item-title" }, options.label ?? ""),
          tags.div(
            { class: "item-after" },
            tags.label(
              { class: classNames("toggle", "toggle-init", colorClass("f7Toggle", options.color)) },
              tags.input({
                id: requireInputId("f7Toggle", options.inputId),
                type: "checkbox",
                checked: options.checked === true,
              }),
              tags.span({ class: "toggle-icon" }),
            ),
          ),
        ),
      ),
    ),
  );

export interface F7CheckboxOptions {
  readonly inputId: string;
  readonly label?: string | null;
  readonly value?: boolean;
}

export const f7Checkbox = (options: F7CheckboxOptions): VElement =>
  inputList(
    tags.li(
      tags.label(
        { class: "item-checkbox item-content" },
        tags.input({
          id: requireInputId("f7Checkbox", options.inputId),
          type: "checkbox",
          checked: options.value === true,
        }),
        tags.i({ class: "icon icon-checkbox" }),
        tags.div({ class: "item-inner" }, tags.div({ class: "item-title" }, options.label ?? "")),
      ),
    ),
  );

export interface F7CheckboxGroupOptions {
  readonly inputId: string;
  readonly label?: string | null;
  readonly choices: Choices;
  /** Checked values, none by default */
  readonly selected?: ReadonlyArray<string>;
}

/**
 * Checkbox list sharing one name, laid out like `f7Radio`.
 */
export const f7CheckboxGroup = (options: F7CheckboxGroupOptions): VElement => {
  const inputId = requireInputId("f7CheckboxGroup", options.inputId);
  const choices = normalizeChoices("f7CheckboxGroup", options.choices);
  const selected = selectedValues("f7CheckboxGroup", choices, options.selected ?? []);
  return tagList(
    blockTitle(options.label),
    tags.div(
      { class: "list", id: inputId },
      tags.ul(
        {},
        choices.map((choice) =>
          tags.li(
            tags.label(
              { class: "item-checkbox item-content" },
              tags.input({
                type: "checkbox",
                name: inputId,
                value: choice.value,
                checked: selected.includes(choice.value),
              }),
              tags.i({ class: "icon icon-checkbox" }),
              tags.div({ class: "item-inner" }, tags.div({ class: "item-title" }, choice.label)),
            ),
          ),
        ),
      ),
    ),
  );
};

// =============================================================================
// Smart select
// =============================================================================

export interface F7SmartSelectOptions {
  readonly inputId: string;
  readonly label: string;
  readonly choices: Choices;
  /** One value, or several with `multiple`; the first choice by default when single */
  readonly selected?: string | ReadonlyArray<string> | null;
  readonly multiple?: boolean;
  /** Where the choice list opens */
  readonly openIn?: "page" | "sheet" | "popup" | "popover";
  readonly searchbar?: boolean;
  /** Render only the visible options, for long lists */
  readonly virtualList?: boolean;
}

export const f7SmartSelect = (options: F7SmartSelectOptions): VElement => {
  const component = "f7SmartSelect";
  const inputId = requireInputId(component, options.inputId);
  const choices = normalizeChoices(component, options.choices);
  const multiple = options.multiple ?? false;
  const given = options.selected ?? null;
  const requested: ReadonlyArray<string> = given === null ? [] : typeof given === "string" ? [given] : given;
  if (!multiple && requested.length > 1) {
    throw invalidArgument(component, "selected", "Only one value can be selected without multiple");
  }
  const selected: ReadonlyArray<string> =
    !multiple && requested.length === 0
      ? [selectedValue(component, choices, null)]
      : selectedValues(component, choices, requested);

  return inputList(
    tags.li(
      tags.a(
        {
          class: "item-link smart-select smart-select-init",
          "data-open-in": options.openIn ?? "page",
          "data-searchbar": flag(options.searchbar ?? true),
          "data-virtual-list": flag(options.virtualList ?? false),
        },
        tags.select(
          { id: inputId, name: inputId, multiple },
          choices.map((choice) =>
            tags.option({ value: choice.value, selected: selected.includes(choice.value) }, choice.label),
          ),
        ),
        tags.div(
          { class: "item-content" },
          tags.div({ class: "item-inner" }, tags.div({ class: "item-title" }, options.label)),
        ),
      ),
    ),
  );
};

// =============================================================================
// Stepper
// =============================================================================

export interface F7StepperOptions {
  readonly inputId: string;
  readonly label?: string | null;
  readonly min: number;
  readonly max: number;
  readonly value: number;
  readonly step?: number;
  readonly fill?: boolean;
  readonly rounded?: boolean;
  readonly raised?: boolean;
  readonly size?: "small" | "large" | null;
  readonly color?: string | null;
  /** Jump to the other bound past min/max */
  readonly wraps?: boolean;
  /** Keep stepping while a button is held */
  readonly autorepeat?: boolean;
  /** Let the user type the value */
  readonly manual?: boolean;
  readonly decimalPoint?: number;
}

export const f7Stepper = (options: F7StepperOptions): VElement => {
  const component = "f7Stepper";
  const inputId = requireInputId(component, options.inputId);
  const min = requireFinite(component, "min", options.min);
  const max = requireFinite(component, "max", options.max);
  const value = requireFinite(component, "value", options.value);
  const step = requireFinite(component, "step", options.step ?? 1);
  const decimalPoint = options.decimalPoint ?? 4;
  if (min > max) {
    throw invalidArgument(component, "min", `min (${min}) is greater than max (${max})`);
  }
  if (value < min || value > max) {
    throw invalidArgument(component, "value", `value ${value} is outside [${min}, ${max}]`);
  }
  if (step <= 0) {
    throw invalidArgument(component, "step", `step must be positive, got ${step}`);
  }
  if (!Number.isInteger(decimalPoint) || decimalPoint < 0) {
    throw invalidArgument(component, "decimalPoint", `decimalPoint must be a non-negative integer`);
  }
  const size = options.size ?? null;
  const manual = options.manual ?? false;

  return tagList(
    blockTitle(options.label),
    tags.div(
      {
        class: classNames(
          "stepper",
          "stepper-init",
          options.fill === true && "stepper-fill",
          options.rounded === true && "stepper-round",
          options.raised === true && "stepper-raised",
          size !== null && `stepper-${size}`,
          colorClass(component, options.color),
        ),
        id: inputId,
        "data-min": min,
        "data-max": max,
        "data-step": step,
        "data-value": value,
        "data-wraps": flag(options.wraps ?? false),
        "data-autorepeat": flag(options.autorepeat ?? true),
        "data-autorepeat-dynamic": flag(options.autorepeat ?? true),
        "data-manual-input-mode": flag(manual),
        "data-decimal-point": decimalPoint,
      },
      tags.div({ class: "stepper-button-minus" }),
      tags.div(
        { class: "stepper-input-wrap" },
        tags.input({ type: "text", value, min, max, step, readonly: !manual }),
      ),
      tags.div({ class: "stepper-button-plus" }),
    ),
  );
};

// =============================================================================
// Slider
// =============================================================================

export interface F7SliderOptions {
  readonly inputId: string;
  readonly label?: string | null;
  readonly min: number;
  readonly max: number;
  /** A number, or `[low, high]` for a range with two knobs */
  readonly value: number | readonly [number, number];
  readonly step?: number;
  /** Show a scale under the track */
  readonly scale?: boolean;
  readonly scaleSteps?: number;
  readonly vertical?: boolean;
  readonly color?: string | null;
}

export const f7Slider = (options: F7SliderOptions): VElement => {
  const component = "f7Slider";
  const inputId = requireInputId(component, options.inputId);
  const min = requireFinite(component, "min", options.min);
  const max = requireFinite(component, "max", options.max);
  const step = requireFinite(component, "step", options.step ?? 1);
  const scaleSteps = options.scaleSteps ?? 5;
  if (min >= max) {
    throw invalidArgument(component, "min", `min (${min}) must be lower than max (${max})`);
  }
  if (step <= 0) {
    throw invalidArgument(component, "step", `step must be positive, got ${step}`);
  }
  if (!Number.isInteger(scaleSteps) || scaleSteps < 1) {
    throw invalidArgument(component, "scaleSteps", "scaleSteps must be a positive integer");
  }
  const value = options.value;
  const low = typeof value === "number" ? value : value[0];
  const high = typeof value === "number" ? null : value[1];
  const dual = high !== null;
  for (const v of dual ? [low, high] : [low]) {
    requireFinite(component, "value", v);
    if (v < min || v > max) {
      throw invalidArgument(component, "value", `value ${v} is outside [${min}, ${max}]`);
    }
  }
  if (dual && low > high) {
    throw invalidArgument(component, "value", `range start ${low} is greater than its end ${high}`);
  }

  return tagList(
    blockTitle(options.label),
    tags.div(
      {
        class: classNames(
          "range-slider",
          "range-slider-init",
          options.vertical === true && "range-slider-vertical",
          colorClass(component, options.color),
        ),
        id: inputId,
        "data-min": min,
        "data-max": max,
        "data-step": step,
        "data-label": "true",
        "data-scale": flag(options.scale ?? false),
        "data-scale-steps": scaleSteps,
        "data-vertical": flag(options.vertical ?? false),
        "data-dual": flag(dual),
        "data-value": dual ? undefined : low,
        "data-value-left": dual ? low : undefined,
        "data-value-right": dual ? high : undefined,
      },
      !dual && tags.input({ type: "range", min, max, step, value: low }),
    ),
  );
};
