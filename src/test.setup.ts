// Shared test setup for Vitest
// Lets React know updates in tests are wrapped in act()
// See: https://react.dev/reference/react/act
declare global {
  // eslint-disable-next-line no-var
  var IS_REACT_ACT_ENVIRONMENT: boolean | undefined;
}

globalThis.IS_REACT_ACT_ENVIRONMENT = true;

export {};
