/**
 * Browser entry point, bundled by Vite into `/static/app.js` and loaded by
 * every server-rendered page. Each feature attaches only when its markup is
 * on the page.
 */

import { initFormValidation } from "./form-validation";
import { initRangeOutputs } from "./range-outputs";
import { initRecommendations } from "./recommendations";

function init(): void {
  for (const form of document.querySelectorAll<HTMLFormElement>("form[data-validate]")) {
    initFormValidation(form);
  }

  const settingsForm = document.querySelector<HTMLFormElement>("form.settings-form");
  if (settingsForm) initRangeOutputs(settingsForm);

  const panel = document.getElementById("recommendations");
  if (panel) {
    initRecommendations(panel).catch((err: unknown) => {
      console.error("[recommendations] Failed to initialise panel:", err);
    });
  }
}

if (document.readyState === "loading") {
  document.addEventListener("DOMContentLoaded", init);
} else {
  init();
}
