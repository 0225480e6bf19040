/** Status page served at `/`. Polls `/api/status` and `/api/history`. */
export const COMLINK_PAGE = `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>Stratus ComLink</title>
  <style>
    body { background: #1a1a2e; color: #eee; font-family: sans-serif; padding: 20px; }
    h1 { color: #4a9eff; }
    pre { background: #11111d; padding: 12px; border-radius: 4px; }
    .pilot { color: #9fd3ff; }
    .atc { color: #ffd479; }
  </style>
</head>
<body>
  <h1>Stratus ComLink</h1>
  <pre id="status">loading...</pre>
  <div id="history"></div>
  <script>
    async function refresh() {
      try {
        const status = await (await fetch("/api/status")).json();
        document.getElementById("status").textContent = JSON.stringify(status, null, 2);
        const history = await (await fetch("/api/history")).json();
        const box = document.getElementById("history");
        box.replaceChildren(...history.entries.map((e) => {
          const p = document.createElement("p");
          p.className = e.speaker;
          p.textContent = (e.speaker === "pilot" ? "PILOT: " : "ATC: ") + e.message;
          return p;
        }));
      } catch (err) {
        document.getElementById("status").textContent = "offline: " + err;
      }
    }
    refresh();
    setInterval(refresh, 2000);
  </script>
</body>
</html>`;
