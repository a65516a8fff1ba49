import type { FlashMessage } from "../../shared/types";

export default function FlashBanner({ flash }: { flash: FlashMessage }) {
  return (
    <div className={`flash flash-${flash.type}`} role={flash.type === "error" ? "alert" : "status"}>
      {flash.message}
    </div>
  );
}
