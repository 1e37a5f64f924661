// =============================================================================
// Public API
// =============================================================================

// Page and app configuration
export { f7Page, preloaderScript } from "./page.js";
export type { F7PageOptions } from "./page.js";
export { f7Init, resolveInitOptions, appParameters, F7InitOptionsSchema } from "./config.js";
export type { F7InitOptions, F7InitConfig } from "./config.js";
export {
  defaultAssets,
  resolveAssets,
  cssDependencies,
  jsDependencies,
  pwaDependencies,
} from "./dependencies.js";
export type { F7Assets, PwaOptions } from "./dependencies.js";

// Layouts
export {
  f7SingleLayout,
  f7TabLayout,
  f7SplitLayout,
  f7Items,
  f7Item,
  SIDEBAR_ID,
  SIDEBAR_VIEW_ID,
} from "./layouts.js";
export type { F7SingleLayoutOptions, F7TabLayoutOptions, F7SplitLayoutOptions } from "./layouts.js";

// Navigation chrome
export { f7Icon, f7Link, f7Navbar, f7SubNavbar, f7Toolbar, f7Appbar } from "./navigation.js";
export type {
  F7IconOptions,
  F7LinkOptions,
  F7NavbarOptions,
  F7ToolbarOptions,
  F7AppbarOptions,
} from "./navigation.js";
export { f7Panel, f7PanelMenu, f7PanelItem, isF7Panel } from "./panels.js";
export type { F7PanelOptions, F7PanelItemOptions } from "./panels.js";
export { f7Tabs, f7Tab, tabIdOf } from "./tabs.js";
export type { F7TabsOptions, F7TabOptions } from "./tabs.js";

// Inputs
export {
  f7Text,
  f7Password,
  f7TextArea,
  f7Select,
  f7Radio,
  f7Toggle,
  f7Checkbox,
  f7CheckboxGroup,
  f7SmartSelect,
  f7Stepper,
  f7Slider,
  normalizeChoices,
} from "./inputs.js";
export type {
  Choices,
  F7TextOptions,
  F7TextAreaOptions,
  F7SelectOptions,
  F7RadioOptions,
  F7ToggleOptions,
  F7CheckboxOptions,
  F7CheckboxGroupOptions,
  F7SmartSelectOptions,
  F7StepperOptions,
  F7SliderOptions,
} from "./inputs.js";

// Containers
export {
  f7Block,
  f7BlockTitle,
  f7BlockHeader,
  f7BlockFooter,
  f7Card,
  f7Button,
  f7Segment,
  f7Badge,
} from "./containers.js";
export type {
  F7BlockOptions,
  F7CardOptions,
  F7ButtonOptions,
  F7SegmentOptions,
} from "./containers.js";

// Lists
export { f7List, f7ListItem } from "./lists.js";
export type { F7ListMode, F7ListOptions, F7ListItemOptions } from "./lists.js";

// Typography, effects and grid
export {
  f7Margin,
  f7Padding,
  f7Align,
  f7Float,
  f7Shadow,
  f7Row,
  f7Col,
  f7Flex,
} from "./typography.js";
export type { SpacingSide, F7ShadowOptions } from "./typography.js";

// Colors and errors
export { F7_COLORS, getF7Colors, isF7Color, colorClass } from "./colors.js";
export type { F7Color } from "./colors.js";
export { ComponentArgumentError } from "./errors.js";
