import React, { useMemo, useState } from "react";
import { Box, Text, render, useApp } from "ink";
import SelectInput from "ink-select-input";
import type { Scenario } from "../scenarios/types";

type SelectItem<T> = {
  key?: string;
  label: string;
  value: T;
};

// undefined runs every scenario.
export type ScenarioChoice = string | undefined;

export const selectScenario = async (scenarios: Scenario[]): Promise<ScenarioChoice> => {
  let choice: ScenarioChoice;

  const ScenarioApp = () => {
    const { exit } = useApp();
    const [selected, setSelected] = useState<ScenarioChoice>(undefined);

    const items = useMemo<SelectItem<ScenarioChoice>[]>(() => {
      const base: SelectItem<ScenarioChoice>[] = [
        { key: "all", label: `All scenarios (${scenarios.length})`, value: undefined },
      ];

      const single = scenarios.map<SelectItem<ScenarioChoice>>((scenario) => ({
        key: scenario.id,
        label: `${scenario.id} — ${scenario.description}`,
        value: scenario.id,
      }));
      return [...base, ...single];
    }, []);

    return (
      <Box flexDirection="column" padding={1}>
        <Text>Wire Probe — Scenario Selector</Text>
        <SelectInput<ScenarioChoice>
          items={items}
          onSelect={(item: SelectItem<ScenarioChoice>) => {
            setSelected(item.value);
            choice = item.value;
            exit();
          }}
        />
        <Box marginTop={1}>
          <Text>Selected: {selected ?? "All scenarios"}</Text>
        </Box>
      </Box>
    );
  };

  const app = render(<ScenarioApp />);
  await app.waitUntilExit();
  return choice;
};
