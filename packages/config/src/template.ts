export type ConfigTemplateOptions = {
  envName?: string;
};

/**
 * Starter config written by `pgshift init`. Passwords are read from the
 * environment so the file can be committed.
 */
export const renderConfigTemplate = ({
  envName = "default",
}: ConfigTemplateOptions = {}): string => `variable "source_database" {
  type    = string
  default = "postgres"
}

env "${envName}" {
  source {
    host     = "source.example.internal"
    port     = 5432
    database = var.source_database
    user     = "postgres"
    password = env("SOURCE_PGPASSWORD")
  }

  target {
    host     = "localhost"
    port     = 5432
    database = var.source_database
    user     = "postgres"
    password = env("TARGET_PGPASSWORD")
  }

  dump {
    dir = "dump"
  }

  restore {
    jobs = 4
  }

  logs {
    dir = "logs"
  }

  reports {
    dir = "output"
  }
}
`;
