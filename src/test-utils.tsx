import type { ReactElement, ReactNode } from "react";
import { render, cleanup, type RenderOptions } from "@testing-library/react";
import { Provider } from "./components/ui/provider";
import { StoreProvider } from "./store/StoreContext";
import type { IRootStore } from "./store/RootStore";

interface CustomRenderOptions extends Omit<RenderOptions, "wrapper"> {
  store?: IRootStore;
}

function Wrapper({
  children,
  store,
}: {
  children: ReactNode;
  store?: IRootStore;
}) {
  const content = <Provider>{children}</Provider>;
  return store ? <StoreProvider store={store}>{content}</StoreProvider> : content;
}

function customRender(ui: ReactElement, options?: CustomRenderOptions) {
  const { store, ...renderOptions } = options || {};
  cleanup();
  return render(ui, {
    wrapper: ({ children }) => <Wrapper store={store}>{children}</Wrapper>,
    ...renderOptions,
  });
}

export * from "@testing-library/react";
export { customRender as render };
