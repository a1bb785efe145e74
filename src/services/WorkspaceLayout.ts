import { mkdir } from "node:fs/promises";
import path from "node:path";

/**
 * 工作目錄結構：
 *   <root>/*.NEF              來源 RAW
 *   <root>/Jpeg/              轉出的 JPEG
 *   <root>/Panoramas/         接圖結果
 *   <root>/.pano/bursts.json  連拍紀錄
 *   <root>/.pano/tmp/         接圖過程的暫存
 */
export class WorkspaceLayout {
  readonly jpegDir: string;
  readonly panoramaDir: string;
  readonly projectDir: string;
  readonly artifactPath: string;
  readonly tmpDir: string;

  private constructor(readonly root: string) {
    this.jpegDir = path.join(root, "Jpeg");
    this.panoramaDir = path.join(root, "Panoramas");
    this.projectDir = path.join(root, ".pano");
    this.artifactPath = path.join(this.projectDir, "bursts.json");
    this.tmpDir = path.join(this.projectDir, "tmp");
  }

  static fromRoot(root: string) {
    return new WorkspaceLayout(path.resolve(root));
  }

  async ensure() {
    for (const dir of [this.jpegDir, this.panoramaDir, this.tmpDir]) {
      await mkdir(dir, { recursive: true });
    }
  }

  jpegPathOf(sourcePath: string) {
    return path.join(this.jpegDir, `${path.parse(sourcePath).name}.jpg`);
  }
}
