import { z } from "zod";
import type { EffectiveConfig } from "../merge/merger.js";
import { MissingRequiredKeyError } from "../shared/errors.js";
import { readBoolean, readEnum, readList, readString, type ValueLocation } from "../shared/values.js";
import type { ChainRole, ConfigValue } from "../types/config.js";
import type { PartitionRule, RootScheme, StorageConstraints, ValidatedStorageConfig } from "../types/storage.js";

const ROOT_SCHEMES: z.ZodType<RootScheme> = z.enum(["PLAIN", "BTRFS", "LVM", "LVM_THINP"]);

export type PayloadSource = "CLOSEST_MIRROR" | "CDN" | "CDROM" | "REPOSITORIES";
const PAYLOAD_SOURCES: z.ZodType<PayloadSource> = z.enum(["CLOSEST_MIRROR", "CDN", "CDROM", "REPOSITORIES"]);

export type NetworkOnBoot = "NONE" | "DEFAULT_ROUTE_DEVICE" | "FIRST_WIRED_WITH_LINK" | "ALL";
const NETWORK_ON_BOOT: z.ZodType<NetworkOnBoot> = z.enum(["NONE", "DEFAULT_ROUTE_DEVICE", "FIRST_WIRED_WITH_LINK", "ALL"]);

/** Values returned when a key is absent from every file in the chain. */
export const FACADE_DEFAULTS = {
  defaultScheme: "LVM",
  helpDirectory: "/usr/share/anaconda/help",
  defaultSource: "CLOSEST_MIRROR",
  enableClosestMirror: true,
  defaultOnBoot: "NONE",
  efiDir: "default",
  menuAutoHide: false,
} as const;

export interface ProductSettings {
  readonly productName: string;
  readonly variantName?: string;
  readonly baseProductName?: string;
}

export interface StorageSettings {
  readonly defaultScheme: RootScheme;
  readonly fileSystemType?: string;
  readonly defaultPartitioning: readonly PartitionRule[];
}

export interface UserInterfaceSettings {
  readonly helpDirectory: string;
  readonly hiddenSpokes: readonly string[];
  readonly defaultHelpPages: readonly string[];
  readonly customStylesheet?: string;
}

export interface PayloadSettings {
  readonly defaultSource: PayloadSource;
  readonly enableClosestMirror: boolean;
  readonly defaultRpmGpgKeys: readonly string[];
  readonly updatesRepositories: readonly string[];
}

export interface LicenseSettings {
  readonly eula?: string;
}

export interface NetworkSettings {
  readonly defaultOnBoot: NetworkOnBoot;
}

export interface BootloaderSettings {
  readonly efiDir: string;
  readonly menuAutoHide: boolean;
}

export interface ChainSummary {
  readonly role: ChainRole;
  readonly productName?: string;
  readonly variantName?: string;
  readonly path: string;
}

/**
 * Read-only view handed to the rest of the installer. Every typed section is
 * read and validated on construction, so a malformed enum or boolean fails
 * resolution rather than a later accessor call. `get` reaches any key, known
 * or not.
 */
export class EffectiveConfiguration {
  readonly validatedStorage: ValidatedStorageConfig;
  readonly chain: readonly ChainSummary[];
  readonly product: ProductSettings;
  readonly storage: StorageSettings;
  readonly ui: UserInterfaceSettings;
  readonly payload: PayloadSettings;
  readonly license: LicenseSettings;
  readonly network: NetworkSettings;
  readonly bootloader: BootloaderSettings;
  private readonly config: EffectiveConfig;

  constructor(config: EffectiveConfig, validatedStorage: ValidatedStorageConfig, chain: readonly ChainSummary[]) {
    this.config = config;
    this.validatedStorage = validatedStorage;
    this.chain = Object.freeze([...chain]);
    this.product = this.readProduct();
    this.storage = this.readStorage();
    this.ui = this.readUserInterface();
    this.payload = this.readPayload();
    this.license = Object.freeze({ eula: this.string("License", "eula") });
    this.network = Object.freeze({
      defaultOnBoot: readEnum(NETWORK_ON_BOOT, this.config.get("Network", "default_on_boot"), this.at("Network", "default_on_boot"), FACADE_DEFAULTS.defaultOnBoot),
    });
    this.bootloader = Object.freeze({
      efiDir: this.string("Bootloader", "efi_dir") ?? FACADE_DEFAULTS.efiDir,
      menuAutoHide: readBoolean(this.config.get("Bootloader", "menu_auto_hide"), this.at("Bootloader", "menu_auto_hide"), FACADE_DEFAULTS.menuAutoHide),
    });
  }

  get(section: string, key: string): ConfigValue | undefined {
    return this.config.get(section, key);
  }

  sourceOf(section: string, key: string): string | undefined {
    return this.config.sourceOf(section, key);
  }

  get storageConstraints(): StorageConstraints {
    return this.validatedStorage.constraints;
  }

  private readProduct(): ProductSettings {
    const productName = this.string("Product", "product_name");
    if (productName === undefined) {
      throw new MissingRequiredKeyError("Product", "product_name", { chain: this.chain.map((c) => c.path) });
    }
    return Object.freeze({
      productName,
      variantName: this.string("Product", "variant_name"),
      baseProductName: this.string("Base Product", "product_name"),
    });
  }

  private readStorage(): StorageSettings {
    return Object.freeze({
      defaultScheme: readEnum(ROOT_SCHEMES, this.config.get("Storage", "default_scheme"), this.at("Storage", "default_scheme"), FACADE_DEFAULTS.defaultScheme),
      fileSystemType: this.string("Storage", "file_system_type"),
      defaultPartitioning: Object.freeze(this.validatedStorage.rules.map((v) => v.rule)),
    });
  }

  private readUserInterface(): UserInterfaceSettings {
    return Object.freeze({
      helpDirectory: this.string("User Interface", "help_directory") ?? FACADE_DEFAULTS.helpDirectory,
      hiddenSpokes: this.list("User Interface", "hidden_spokes"),
      defaultHelpPages: this.list("User Interface", "default_help_pages"),
      customStylesheet: this.string("User Interface", "custom_stylesheet"),
    });
  }

  private readPayload(): PayloadSettings {
    return Object.freeze({
      defaultSource: readEnum(PAYLOAD_SOURCES, this.config.get("Payload", "default_source"), this.at("Payload", "default_source"), FACADE_DEFAULTS.defaultSource),
      enableClosestMirror: readBoolean(this.config.get("Payload", "enable_closest_mirror"), this.at("Payload", "enable_closest_mirror"), FACADE_DEFAULTS.enableClosestMirror),
      defaultRpmGpgKeys: this.list("Payload", "default_rpm_gpg_keys"),
      updatesRepositories: this.list("Payload", "updates_repositories"),
    });
  }

  /** Canonical text of the merged values. */
  serialize(): string {
    return this.config.serialize();
  }

  toJSON(): Record<string, unknown> {
    return {
      chain: this.chain,
      values: this.config.toJSON(),
      storage: this.validatedStorage,
    };
  }

  private at(section: string, key: string): ValueLocation {
    return { section, key, source: this.config.sourceOf(section, key) };
  }

  private string(section: string, key: string): string | undefined {
    return readString(this.config.get(section, key), this.at(section, key));
  }

  private list(section: string, key: string): readonly string[] {
    return Object.freeze(readList(this.config.get(section, key), this.at(section, key)));
  }
}
