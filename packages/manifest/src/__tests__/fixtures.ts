import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

/**
 * Create a temporary project tree from a map of relative path to content.
 */
export function createProject(files: Record<string, string | Buffer>): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'potcheck-project-'));
  writeFiles(root, files);
  return root;
}

export function writeFiles(root: string, files: Record<string, string | Buffer>): void {
  for (const [relative, content] of Object.entries(files)) {
    const filePath = path.join(root, relative);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
  }
}

export function removeProject(root: string): void {
  fs.rmSync(root, { recursive: true, force: true });
}

export const RS_TRANSLATABLE = 'fn label() -> String {\n    gettext("Send")\n}\n';
export const RS_PLAIN = 'fn main() {}\n';
export const RS_MACRO = 'fn label() -> String {\n    gettext!("Hello {}", name)\n}\n';
export const UI_TRANSLATABLE =
  '<interface>\n  <object class="GtkLabel">\n    <property name="label" translatable="yes">Send</property>\n  </object>\n</interface>\n';
export const UI_PLAIN = '<interface>\n  <object class="GtkBox"/>\n</interface>\n';
export const BLP_TRANSLATABLE = 'using Gtk 4.0;\n\nLabel {\n  label: _("Send");\n}\n';
export const BLP_PLAIN = 'using Gtk 4.0;\n\nBox {}\n';
