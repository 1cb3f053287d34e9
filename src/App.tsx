import QuickEntry from "./pages/QuickEntry";
import { Toaster } from "./components/ui/toaster";
import { StoreProvider } from "./store/StoreContext";

function App() {
  return (
    <StoreProvider>
      <Toaster />
      <QuickEntry />
    </StoreProvider>
  );
}

export default App;
