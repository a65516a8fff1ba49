/** Mirror each range input's value into its `<output data-output-for>`. */
export function initRangeOutputs(form: HTMLFormElement): void {
  form.addEventListener("input", (event) => {
    const input = event.target;
    if (!(input instanceof HTMLInputElement) || input.type !== "range") return;

    const output = form.querySelector<HTMLOutputElement>(`output[data-output-for="${input.name}"]`);
    if (output) output.textContent = input.value;
  });
}
