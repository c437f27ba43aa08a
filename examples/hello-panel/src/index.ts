import { createNodeInterface } from "@panelstack/node";

type State = { count: number; sound: boolean; volume: number };

const { ui } = createNodeInterface();
let state: State = { count: 0, sound: true, volume: 0.5 };

function frame(forgetColumn: boolean): void {
  ui.beginFrame();
  if (ui.startPanel("Counter", { x: 20, y: 20, width: 260, height: 180 })) {
    ui.label(`Count: ${state.count}`);
    if (ui.button("Increment", "+1")) state = { ...state, count: state.count + 1 };

    ui.enterColumn();
    const sound = ui.checkbox("Sound", "Enabled", state.sound);
    const volume = ui.slider("Volume", state.volume, 0, 1);
    state = { ...state, sound, volume };
    // endPanel() then reports the missing leaveColumn().
    if (!forgetColumn) ui.leaveColumn();

    ui.endPanel("Counter");
  }
  ui.draw();
}

frame(false);
frame(true);
