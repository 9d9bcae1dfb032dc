import { useEffect, useState } from "react";
import { DuopaneSplitPanel } from "./duopane/components/DuopaneSplitPanel";
import { SplitterThemeProvider } from "./duopane/lib/theming";
import { RatioStore } from "./duopane/lib/ratioStore";
import { log } from "./duopane/services/logger";

const SIDEBAR_SNAP_POINTS = [0.2, 0.33, 0.5];

// Caller-owned so the toolbar can animate the sidebar independently of the divider
const sidebarStore = new RatioStore({ initialRatio: 0.25 });

function App() {
  const [sidebarRatio, setSidebarRatio] = useState(sidebarStore.value);

  useEffect(() => sidebarStore.subscribe(setSidebarRatio), []);

  const resetSidebar = () => {
    sidebarStore.interpolateTo(0.25).catch((error: unknown) => {
      log.error("App", "Sidebar reset failed", { error: String(error) });
    });
  };

  return (
    <SplitterThemeProvider theme={{ dividerThickness: 4, handleHitSlop: 4, blockerColor: "transparent" }}>
      <div style={{ display: "flex", flexDirection: "column", height: "100%" }}>
        <header className="demo-status" style={{ padding: "6px 12px" }}>
          sidebar {Math.round(sidebarRatio * 100)}%{" "}
          <button type="button" onClick={resetSidebar}>
            Reset
          </button>
        </header>
        <div style={{ flex: 1, minHeight: 0 }}>
          <DuopaneSplitPanel
            id="workbench"
            store={sidebarStore}
            minStartPanelSize={160}
            minEndPanelSize={320}
            snapPoints={SIDEBAR_SNAP_POINTS}
            snapTolerance={0.03}
            onDragEnd={(ratio) => log.info("App", "Sidebar resized", { ratio })}
            firstPanel={<div className="demo-pane">Explorer</div>}
            secondPanel={
              <DuopaneSplitPanel
                axis="vertical"
                initialRatio={0.7}
                minPanelSize={80}
                doubleTapResetTo={0.7}
                holdScrollWhileDragging
                firstPanel={<div className="demo-pane">Editor</div>}
                secondPanel={<div className="demo-pane">Terminal</div>}
              />
            }
          />
        </div>
      </div>
    </SplitterThemeProvider>
  );
}

export default App;
