export type { FormPage, RawFormElement, RawOption, ApplyInstruction, FieldState } from './types';
export { PlaywrightFormPage } from './playwright';
export {
  MockFormPage,
  type MockElementInit,
  type MockOptionInit,
  type MockElement,
  type MockFormPageOptions,
  type MockDomEvent,
  type DispatchedEvent,
} from './mock';
