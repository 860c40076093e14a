/**
 * Basic Usage Example
 *
 * Orders the nodes of a small project tree the way a host tree view would.
 * Run with: npx tsx examples/basic-usage.ts
 */

import {
  createOrderProvider,
  type DisplayOrderPropertyValues,
  type TreeItemPropertyContext,
} from "@treeorder/sdk";

interface Node {
  name: string;
  isFolder: boolean;
  fullPath: string;
}

class NodeValues implements DisplayOrderPropertyValues {
  order: number | undefined;

  setDisplayOrder(order: number): void {
    this.order = order;
  }
}

function main(): void {
  const projectDir = "/work/Console";

  // Order as listed in the project file, not alphabetical
  const provider = createOrderProvider({
    projectDir,
    items: ["Startup.cs", "Services/Program.cs", "Services/Clock.cs", "Tools/Program.cs"],
  });

  const nodes: Node[] = [
    { name: "Tools", isFolder: true, fullPath: `${projectDir}/Tools` },
    { name: "Program.cs", isFolder: false, fullPath: `${projectDir}/Tools/Program.cs` },
    { name: "Services", isFolder: true, fullPath: `${projectDir}/Services` },
    { name: "Clock.cs", isFolder: false, fullPath: `${projectDir}/Services/Clock.cs` },
    { name: "Program.cs", isFolder: false, fullPath: `${projectDir}/Services/Program.cs` },
    { name: "Startup.cs", isFolder: false, fullPath: `${projectDir}/Startup.cs` },
    { name: "notes.txt", isFolder: false, fullPath: `${projectDir}/notes.txt` },
    { name: "bin", isFolder: true, fullPath: `${projectDir}/bin` },
  ];

  console.log("📂 Display order:");
  for (const node of nodes) {
    const context: TreeItemPropertyContext = {
      itemName: node.name,
      isFolder: node.isFolder,
      itemType: node.isFolder ? "Folder" : "Compile",
      metadata: { FullPath: node.fullPath },
    };
    const values = new NodeValues();
    provider.calculatePropertyValues(context, values);

    const label = node.fullPath.slice(projectDir.length + 1);
    console.log(`   ${label.padEnd(22)} ${values.order ?? "(host default)"}`);
  }
}

main();
