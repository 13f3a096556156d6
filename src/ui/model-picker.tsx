import React, { useEffect, useMemo, useState } from "react";
import { Box, Text, render, useInput, type Key } from "ink";
import type { RemoteModel } from "../../llm/Interfaces";

export type Tab = "built-in" | "remote";
const TABS: Tab[] = ["built-in", "remote"];

export interface PickerModel {
  id: string;
  detail?: string;
}

export interface ModelPickerOutcome {
  modelId?: string;
  source?: Tab;
  cancelled?: boolean;
}

interface ModelPickerProps {
  pageSize: number;
  currentModel: string;
  builtInModels: string[];
  loadRemoteModels: () => Promise<RemoteModel[]>;
  onDone: (result: ModelPickerOutcome) => void;
}

export function tabLabel(tab: Tab): string {
  return tab === "built-in" ? "Built-in" : "Remote";
}

export function nextTab(tab: Tab): Tab {
  return TABS[(TABS.indexOf(tab) + 1) % TABS.length];
}

export function prevTab(tab: Tab): Tab {
  return TABS[(TABS.indexOf(tab) + TABS.length - 1) % TABS.length];
}

export function filterModels(models: PickerModel[], filter: string): PickerModel[] {
  const q = filter.trim().toLowerCase();
  if (!q) return models;
  return models.filter((m) => m.id.toLowerCase().includes(q));
}

export function clampIndex(index: number, length: number): number {
  if (length <= 0) return 0;
  return Math.min(Math.max(0, index), length - 1);
}

function ModelPickerApp(props: ModelPickerProps) {
  const [activeTab, setActiveTab] = useState<Tab>("built-in");
  const [filter, setFilter] = useState("");
  const [shown, setShown] = useState(props.pageSize);
  const [selectedIndex, setSelectedIndex] = useState(() => Math.max(0, props.builtInModels.indexOf(props.currentModel)));

  const [remoteModels, setRemoteModels] = useState<PickerModel[] | undefined>(undefined);
  const [remoteLoading, setRemoteLoading] = useState(false);
  const [remoteError, setRemoteError] = useState<string | undefined>(undefined);

  const builtIn = useMemo(
    () => props.builtInModels.map((id): PickerModel => ({ id, detail: id === props.currentModel ? "current" : undefined })),
    [props.builtInModels, props.currentModel],
  );

  const baseModels = activeTab === "built-in" ? builtIn : remoteModels || [];
  const matchingModels = useMemo(() => filterModels(baseModels, filter), [baseModels, filter]);
  const visibleModels = useMemo(() => matchingModels.slice(0, Math.max(shown, selectedIndex + 1)), [matchingModels, shown, selectedIndex]);

  useEffect(() => {
    if (activeTab !== "remote") return;
    if (remoteModels || remoteLoading) return;

    setRemoteLoading(true);
    setRemoteError(undefined);
    props
      .loadRemoteModels()
      .then((models) => setRemoteModels(models.map((m) => ({ id: m.id, detail: m.owned_by }))))
      .catch((error: unknown) => {
        const msg = error instanceof Error ? error.message : String(error);
        setRemoteError(msg);
        setRemoteModels([]);
      })
      .finally(() => setRemoteLoading(false));
  }, [activeTab, remoteModels]);

  const switchTab = (tab: Tab) => {
    setActiveTab(tab);
    setFilter("");
    setShown(props.pageSize);
    setSelectedIndex(0);
  };

  const handleInput = (input: string, key: Key) => {
    if (key.ctrl && (input === "c" || input === "C")) {
      process.stderr.write("\n");
      process.exit(130);
    }

    if (key.escape) {
      if (filter.length > 0) {
        setFilter("");
        setSelectedIndex(0);
        return;
      }
      props.onDone({ cancelled: true });
      return;
    }

    if (key.leftArrow || (key.shift && key.tab)) {
      switchTab(prevTab(activeTab));
      return;
    }
    if (key.rightArrow || key.tab) {
      switchTab(nextTab(activeTab));
      return;
    }
    if (key.upArrow) {
      setSelectedIndex((curr) => clampIndex(curr - 1, matchingModels.length));
      return;
    }
    if (key.downArrow) {
      setSelectedIndex((curr) => clampIndex(curr + 1, matchingModels.length));
      return;
    }
    if (input === " ") {
      setShown((curr) => Math.min(curr + props.pageSize, matchingModels.length));
      return;
    }
    if (key.backspace || key.delete) {
      if (filter.length > 0) {
        setFilter((curr) => curr.slice(0, -1));
        setSelectedIndex(0);
      }
      return;
    }
    if (key.return) {
      const selected = matchingModels[selectedIndex];
      if (!selected) return;
      props.onDone({ modelId: selected.id, source: activeTab });
      return;
    }
    if (input.length === 1 && input.charCodeAt(0) > 32 && input.charCodeAt(0) < 127) {
      setFilter((curr) => curr + input);
      setSelectedIndex(0);
    }
  };

  useInput(handleInput);

  const loading = activeTab === "remote" && remoteLoading;
  const error = activeTab === "remote" ? remoteError : undefined;

  return (
    <Box flexDirection="column">
      <Box>
        {TABS.map((tab, index) => {
          const active = tab === activeTab;
          return (
            <Text key={tab} color={active ? "cyan" : "gray"}>
              {active ? `[${tabLabel(tab)}]` : ` ${tabLabel(tab)} `}
              <Text color="gray">{index < TABS.length - 1 ? "  |  " : ""}</Text>
            </Text>
          );
        })}
      </Box>

      <Box marginTop={1}>
        <Text>
          {filter
            ? `Filter: "${filter}" (${visibleModels.length}/${matchingModels.length})`
            : `Pick a model from ${tabLabel(activeTab)} (${visibleModels.length}/${baseModels.length})`}
        </Text>
      </Box>

      {loading && (
        <Box marginTop={1}>
          <Text color="gray">Loading models...</Text>
        </Box>
      )}

      {error && (
        <Box marginTop={1}>
          <Text color="red">{error}</Text>
        </Box>
      )}

      {!loading && (
        <Box flexDirection="column" marginTop={1}>
          {visibleModels.length === 0 ? (
            <Text color="gray">No models match your filter.</Text>
          ) : (
            visibleModels.map((m, i) => (
              <Text key={m.id} color={i === selectedIndex ? "cyan" : undefined}>
                {i === selectedIndex ? "> " : "  "}
                {i + 1}) {m.id}
                {m.detail ? <Text color="gray">{`  ${m.detail}`}</Text> : null}
              </Text>
            ))
          )}
        </Box>
      )}

      {activeTab === "remote" && (
        <Box marginTop={1}>
          <Text color="gray">Remote models without a built-in schema use the generic parameter set.</Text>
        </Box>
      )}

      <Box marginTop={1}>
        <Text color="gray">[←→] Tabs [↑↓] Lists  [Space] More [Enter] Select [Esc] Reset/Cancel</Text>
      </Box>
    </Box>
  );
}

export function runModelPicker(options: {
  pageSize?: number;
  currentModel: string;
  builtInModels: string[];
  loadRemoteModels: () => Promise<RemoteModel[]>;
}): Promise<ModelPickerOutcome> {
  return new Promise((resolve) => {
    let done = false;
    const app = render(
      <ModelPickerApp
        pageSize={options.pageSize || 10}
        currentModel={options.currentModel}
        builtInModels={options.builtInModels}
        loadRemoteModels={options.loadRemoteModels}
        onDone={(result) => {
          if (done) return;
          done = true;
          app.clear();
          app.unmount();
          // Resolve after Ink teardown so the prompt loop gets stdin back.
          queueMicrotask(() => resolve(result));
        }}
      />,
      { exitOnCtrlC: false, stdout: process.stderr },
    );
  });
}
