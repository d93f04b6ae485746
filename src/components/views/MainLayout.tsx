import { Box, Text } from "ink";
import React, { useEffect, useMemo } from "react";
import { type AppState, isPickerMode, useAppState } from "../../contexts/AppStateContext";
import { PICKER_TITLES, pickerOptions } from "../../services/picker-service";
import { selectedUnit } from "../../state/filter-reducer";
import { buildDetailLines } from "../../utils/details";
import { computeLayout } from "../../utils/layout";
import ConfirmDialog from "../ConfirmDialog";
import DetailsModal from "../DetailsModal";
import Help from "../Help";
import Picker from "../Picker";
import UnitFileViewer from "../UnitFileViewer";
import { Header } from "./Header";
import { LogPanel } from "./LogPanel";
import { SearchBar } from "./SearchBar";
import { UnitList } from "./UnitList";

interface MainLayoutProps {
  version: string;
}

/** Whatever takes the log panel's place in the current mode, if anything. */
function overlayFor(state: AppState): React.ReactNode {
  const { mode, modals } = state;

  if (isPickerMode(mode)) {
    const options = pickerOptions(mode, {
      filters: state.filters,
      logs: state.logs,
      actionOptions: modals.actionOptions,
    });
    return <Picker title={PICKER_TITLES[mode]} options={options} cursor={modals.pickerCursor} />;
  }

  switch (mode) {
    case "confirm":
      return <ConfirmDialog pending={state.pendingAction} indicatorOn={state.ui.indicatorOn} />;
    case "details": {
      const unit = state.filters.units.find((u) => u.name === modals.detailsUnit);
      if (!unit) return null;
      const lines = buildDetailLines(unit, state.properties.cache.get(unit.name) ?? null);
      return (
        <DetailsModal
          unitName={unit.name}
          lines={lines}
          scroll={modals.detailScroll}
          rows={state.layout.detailRows}
        />
      );
    }
    case "unit-file":
      return modals.unitFile ? (
        <UnitFileViewer view={modals.unitFile} rows={state.layout.detailRows} />
      ) : null;
    default:
      return null;
  }
}

export const MainLayout: React.FC<MainLayoutProps> = ({ version }) => {
  const { state, dispatch } = useAppState();
  const { mode, terminal, filters, logs, focus, ui } = state;

  const { panes, layout } = useMemo(
    () => computeLayout(terminal.rows, terminal.cols, mode),
    [terminal.rows, terminal.cols, mode],
  );

  useEffect(() => {
    dispatch({ type: "SET_LAYOUT", payload: layout });
  }, [layout, dispatch]);

  if (mode === "help") {
    return (
      <Box flexDirection="column" paddingX={1} height={terminal.rows - 1}>
        <Help version={version} />
      </Box>
    );
  }

  const overlay = overlayFor(state);
  const selected = selectedUnit(filters);
  const total = filters.filteredIndices.length;

  return (
    <Box flexDirection="column" paddingX={1} height={terminal.rows - 1}>
      <Header version={version} filters={filters} logs={logs} />
      <SearchBar mode={mode} unitQuery={filters.searchQuery} logQuery={logs.search.query} />

      <Box
        flexDirection="column"
        height={panes.unitBox}
        borderStyle="round"
        borderColor={focus === "units" ? "magenta" : "gray"}
        paddingX={1}
        flexWrap="nowrap"
      >
        <UnitList
          filters={filters}
          rows={layout.unitRows}
          cols={layout.logCols}
          focused={focus === "units"}
        />
      </Box>

      <Box flexDirection="column" height={panes.logBox}>
        {overlay ?? (
          <Box
            flexDirection="column"
            flexGrow={1}
            borderStyle="round"
            borderColor={focus === "logs" ? "magenta" : "gray"}
            paddingX={1}
            flexWrap="nowrap"
          >
            <LogPanel logs={logs} focused={focus === "logs"} />
          </Box>
        )}
      </Box>

      <Box justifyContent="space-between">
        <Text dimColor>
          {selected ? `<${selected.name}>` : "<none>"}
        </Text>
        <Text dimColor>
          {ui.status} • {total && filters.selectedIdx !== null ? `${filters.selectedIdx + 1}/${total}` : "0/0"}
        </Text>
      </Box>
    </Box>
  );
};
